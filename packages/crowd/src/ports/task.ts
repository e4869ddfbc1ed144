import type { AssignmentStatus, QualificationRequirement } from "@aws-sdk/client-mturk"
import type { JsonValue, LocationInput } from "@stowage/storage"
import type { CrowdEnvironment } from "../core/environment/environment"

/** Decoded answer document: question identifier → answer. */
export type Answers = Record<string, JsonValue>

export type QuestionSource =
  | { kind: "html"; html: string; frameHeight?: number }
  | {
      kind: "template"
      template: string
      args: Record<string, unknown>
      frameHeight?: number
    }
  | {
      /** Handlebars template read from object storage as text. */
      kind: "template-location"
      location: LocationInput
      args: Record<string, unknown>
      frameHeight?: number
    }
  | { kind: "external"; url: string; frameHeight?: number }
  /** A complete question document, passed through untouched. */
  | { kind: "document"; xml: string }

export interface TaskDefinition {
  title: string
  description: string
  /** USD amount as a decimal string, e.g. "0.25". */
  reward: string
  question: QuestionSource

  /** Default: 86400 (one day) */
  lifetimeInSeconds?: number
  /** Default: 3600 (one hour) */
  assignmentDurationInSeconds?: number
  maxAssignments?: number
  autoApprovalDelayInSeconds?: number
  keywords?: string | string[]

  /** Caller state round-tripped through the HIT's requester annotation. */
  annotation?: JsonValue
  qualificationRequirements?: QualificationRequirement[]
  /** Idempotency token; a retried create with the same token is rejected. */
  requestToken?: string
}

export interface TaskHandle {
  hitId: string
  hitTypeId: string
  hitGroupId?: string
  environment: CrowdEnvironment
  previewUrl: string
}

export interface TaskInfo {
  hitId: string
  hitTypeId?: string
  hitGroupId?: string
  title?: string
  status?: string
  maxAssignments?: number
  createdAt?: Date
  expiresAt?: Date
  /** Unpacked requester annotation, `null` when the HIT has none. */
  annotation: JsonValue
}

export interface TaskResponse {
  assignmentId: string
  hitId: string
  workerId?: string
  status?: AssignmentStatus
  acceptedAt?: Date
  submittedAt?: Date
  answers: Answers
}

export interface FetchResponsesOptions {
  /** Default: Submitted, Approved and Rejected */
  statuses?: AssignmentStatus[]
  pageSize?: number
}
