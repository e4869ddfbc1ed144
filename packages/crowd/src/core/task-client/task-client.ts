import {
  type Assignment,
  type AssignmentStatus,
  CreateAdditionalAssignmentsForHITCommand,
  CreateHITCommand,
  GetAccountBalanceCommand,
  GetHITCommand,
  type HIT,
  ListAssignmentsForHITCommand,
  type MTurkClient,
  UpdateExpirationForHITCommand,
} from "@aws-sdk/client-mturk"
import { type Clock, SystemClock } from "@stowage/clock"
import { type Logger, NullLogger } from "@stowage/logger"
import type { DataStore, JsonValue } from "@stowage/storage"
import { CrowdError } from "../../model/crowd.errors"
import type {
  FetchResponsesOptions,
  QuestionSource,
  TaskDefinition,
  TaskHandle,
  TaskInfo,
  TaskResponse,
} from "../../ports/task"
import { packAnnotation, unpackAnnotation } from "../annotation/annotation"
import { parseAnswers } from "../answers/parse-answers"
import { type CrowdEnvironment, previewUrl } from "../environment/environment"
import { renderExternalQuestion, renderHtmlQuestion, renderTemplate } from "../questions/questions"

const DEFAULT_LIFETIME_SECONDS = 86_400
const DEFAULT_ASSIGNMENT_DURATION_SECONDS = 3_600
const DEFAULT_PAGE_SIZE = 100
const DEFAULT_STATUSES: AssignmentStatus[] = ["Submitted", "Approved", "Rejected"]

const ACCESS_DENIED_NAMES = new Set(["AccessDeniedException", "UnauthorizedOperation"])

export type TaskClientDeps = {
  client: MTurkClient
  environment: CrowdEnvironment
  /** Reads question templates given as storage locations. */
  store?: DataStore
  clock?: Clock
  logger?: Logger
}

/**
 * Creates HITs and collects their responses. Errors from Mechanical Turk
 * surface as {@link CrowdError}; nothing is retried.
 */
export class TaskClient {
  private readonly logger: Logger
  private readonly clock: Clock

  constructor(private readonly deps: TaskClientDeps) {
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "task-client",
      env: deps.environment,
    })
    this.clock = deps.clock ?? new SystemClock()
  }

  get environment(): CrowdEnvironment {
    return this.deps.environment
  }

  async createTask(definition: TaskDefinition): Promise<TaskHandle> {
    const question = await this.renderQuestion(definition.question)
    const keywords = Array.isArray(definition.keywords)
      ? definition.keywords.join(",")
      : definition.keywords
    const annotation =
      definition.annotation !== undefined ? packAnnotation(definition.annotation) : undefined

    const response = await this.call("createTask", {}, () =>
      this.deps.client.send(
        new CreateHITCommand({
          Title: definition.title,
          Description: definition.description,
          Reward: definition.reward,
          Question: question,
          LifetimeInSeconds: definition.lifetimeInSeconds ?? DEFAULT_LIFETIME_SECONDS,
          AssignmentDurationInSeconds:
            definition.assignmentDurationInSeconds ?? DEFAULT_ASSIGNMENT_DURATION_SECONDS,
          ...(definition.maxAssignments !== undefined && {
            MaxAssignments: definition.maxAssignments,
          }),
          ...(definition.autoApprovalDelayInSeconds !== undefined && {
            AutoApprovalDelayInSeconds: definition.autoApprovalDelayInSeconds,
          }),
          ...(keywords && { Keywords: keywords }),
          ...(annotation !== undefined && { RequesterAnnotation: annotation }),
          ...(definition.qualificationRequirements && {
            QualificationRequirements: definition.qualificationRequirements,
          }),
          ...(definition.requestToken && { UniqueRequestToken: definition.requestToken }),
        }),
      ),
    )

    const hit = response.HIT
    if (!hit?.HITId || !hit.HITTypeId) {
      throw CrowdError.serviceError("createTask", {}, "response carried no HIT id", false)
    }

    const handle: TaskHandle = {
      hitId: hit.HITId,
      hitTypeId: hit.HITTypeId,
      ...(hit.HITGroupId && { hitGroupId: hit.HITGroupId }),
      environment: this.deps.environment,
      previewUrl: previewUrl(hit.HITGroupId ?? hit.HITTypeId, this.deps.environment),
    }

    this.logger.debug("Task created", { operation: "createTask", hitId: handle.hitId })

    return handle
  }

  /**
   * Submitted responses for a HIT. Every iteration lists the assignments
   * again from the first page.
   */
  fetchResponses(
    task: TaskHandle | string,
    options: FetchResponsesOptions = {},
  ): AsyncIterable<TaskResponse> {
    const hitId = typeof task === "string" ? task : task.hitId

    return {
      [Symbol.asyncIterator]: () => this.responsePages(hitId, options),
    }
  }

  async getTask(hitId: string): Promise<TaskInfo> {
    const response = await this.call("getTask", { hitId }, () =>
      this.deps.client.send(new GetHITCommand({ HITId: hitId })),
    )

    if (!response.HIT) {
      throw CrowdError.taskNotFound(hitId)
    }

    return toTaskInfo(hitId, response.HIT)
  }

  /** Unpacked state stored with {@link TaskDefinition.annotation}. */
  async readAnnotation(hitId: string): Promise<JsonValue> {
    const task = await this.getTask(hitId)
    return task.annotation
  }

  /** Stops the HIT from accepting new workers; submitted work is kept. */
  async expireTask(hitId: string): Promise<void> {
    await this.call("expireTask", { hitId }, () =>
      this.deps.client.send(
        new UpdateExpirationForHITCommand({ HITId: hitId, ExpireAt: this.clock.now() }),
      ),
    )

    this.logger.debug("Task expired", { operation: "expireTask", hitId })
  }

  async addAssignments(hitId: string, count: number, requestToken?: string): Promise<void> {
    await this.call("addAssignments", { hitId, count }, () =>
      this.deps.client.send(
        new CreateAdditionalAssignmentsForHITCommand({
          HITId: hitId,
          NumberOfAdditionalAssignments: count,
          ...(requestToken && { UniqueRequestToken: requestToken }),
        }),
      ),
    )

    this.logger.debug("Assignments added", { operation: "addAssignments", hitId })
  }

  /** Available balance in USD. */
  async getAccountBalance(): Promise<number> {
    const response = await this.call("getAccountBalance", {}, () =>
      this.deps.client.send(new GetAccountBalanceCommand({})),
    )

    return Number.parseFloat(response.AvailableBalance ?? "0")
  }

  async renderQuestion(source: QuestionSource): Promise<string> {
    switch (source.kind) {
      case "document":
        return source.xml
      case "html":
        return renderHtmlQuestion(source.html, source.frameHeight)
      case "template":
        return renderHtmlQuestion(renderTemplate(source.template, source.args), source.frameHeight)
      case "template-location": {
        if (!this.deps.store) {
          throw CrowdError.serviceError(
            "renderQuestion",
            {},
            "a data store is required to read question templates",
            false,
          )
        }

        const template = await this.deps.store.readAs(source.location, "text")
        return renderHtmlQuestion(renderTemplate(template, source.args), source.frameHeight)
      }
      case "external":
        return renderExternalQuestion(source.url, source.frameHeight)
    }
  }

  private async *responsePages(
    hitId: string,
    options: FetchResponsesOptions,
  ): AsyncGenerator<TaskResponse> {
    let nextToken: string | undefined

    do {
      const token = nextToken
      const page = await this.call("fetchResponses", { hitId }, () =>
        this.deps.client.send(
          new ListAssignmentsForHITCommand({
            HITId: hitId,
            MaxResults: options.pageSize ?? DEFAULT_PAGE_SIZE,
            AssignmentStatuses: options.statuses ?? DEFAULT_STATUSES,
            ...(token && { NextToken: token }),
          }),
        ),
      )

      for (const assignment of page.Assignments ?? []) {
        yield toTaskResponse(hitId, assignment)
      }

      nextToken = page.NextToken
    } while (nextToken)
  }

  private async call<T>(
    operation: string,
    context: Record<string, unknown>,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw translateError(operation, context, err)
    }
  }
}

function toTaskResponse(hitId: string, assignment: Assignment): TaskResponse {
  if (!assignment.AssignmentId) {
    throw CrowdError.serviceError("fetchResponses", { hitId }, "assignment without id", false)
  }

  return {
    assignmentId: assignment.AssignmentId,
    hitId: assignment.HITId ?? hitId,
    ...(assignment.WorkerId && { workerId: assignment.WorkerId }),
    ...(assignment.AssignmentStatus && { status: assignment.AssignmentStatus }),
    ...(assignment.AcceptTime && { acceptedAt: assignment.AcceptTime }),
    ...(assignment.SubmitTime && { submittedAt: assignment.SubmitTime }),
    answers: assignment.Answer ? parseAnswers(assignment.Answer) : {},
  }
}

function toTaskInfo(hitId: string, hit: HIT): TaskInfo {
  return {
    hitId: hit.HITId ?? hitId,
    ...(hit.HITTypeId && { hitTypeId: hit.HITTypeId }),
    ...(hit.HITGroupId && { hitGroupId: hit.HITGroupId }),
    ...(hit.Title && { title: hit.Title }),
    ...(hit.HITStatus && { status: hit.HITStatus }),
    ...(hit.MaxAssignments !== undefined && { maxAssignments: hit.MaxAssignments }),
    ...(hit.CreationTime && { createdAt: hit.CreationTime }),
    ...(hit.Expiration && { expiresAt: hit.Expiration }),
    annotation: unpackAnnotation(hit.RequesterAnnotation),
  }
}

function translateError(
  operation: string,
  context: Record<string, unknown>,
  err: unknown,
): CrowdError {
  if (err instanceof CrowdError) return err

  const name = errorName(err)
  const status = httpStatus(err)
  const message = err instanceof Error ? err.message : ""

  if ((name && ACCESS_DENIED_NAMES.has(name)) || status === 403) {
    return CrowdError.accessDenied(operation, err)
  }

  const hitId = context.hitId
  if (typeof hitId === "string" && name === "RequestError" && /does not exist/i.test(message)) {
    return CrowdError.taskNotFound(hitId, err)
  }

  // ServiceFault is the service's own failure; RequestError means the request was wrong.
  const isRetryable = name === "ServiceFault" || (status !== undefined && status >= 500)

  return CrowdError.serviceError(operation, context, err, isRetryable)
}

function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("$metadata" in err)) return undefined

  const metadata = err.$metadata
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
    return undefined
  }

  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined
}
