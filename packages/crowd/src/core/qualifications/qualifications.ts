import type {
  Comparator,
  HITAccessActions,
  Locale,
  QualificationRequirement,
} from "@aws-sdk/client-mturk"
import { CrowdError } from "../../model/crowd.errors"
import type { CrowdEnvironment } from "../environment/environment"

/** System qualification types maintained by Mechanical Turk. */
export const SystemQualifications = {
  masters: {
    production: "2F1QJWKUDD8XADTFD2Q0G6UTO95ALH",
    sandbox: "2ARFPLSP75KLA8M8DH1HTEQVJT3SY6",
  },
  adult: "00000000000000000060",
  numberApproved: "00000000000000000040",
  percentApproved: "000000000000000000L0",
  locale: "00000000000000000071",
} as const

/** A country code, or a `[country, subdivision]` pair such as `["US", "WA"]`. */
export type LocaleInput = string | readonly [country: string, subdivision: string]

export interface RequirementOptions {
  qualificationTypeId: string
  comparator: Comparator
  integerValues?: number[]
  locales?: LocaleInput[]
  /** Which worker actions the requirement gates. Default: Accept (preview stays open). */
  actionsGuarded?: HITAccessActions
}

export function qualificationRequirement(options: RequirementOptions): QualificationRequirement {
  return {
    QualificationTypeId: options.qualificationTypeId,
    Comparator: options.comparator,
    ...(options.integerValues && { IntegerValues: options.integerValues }),
    ...(options.locales && { LocaleValues: options.locales.map(toLocale) }),
    ActionsGuarded: options.actionsGuarded ?? "Accept",
  }
}

export function mastersRequirement(
  environment: CrowdEnvironment,
  actionsGuarded?: HITAccessActions,
): QualificationRequirement {
  return qualificationRequirement({
    qualificationTypeId: SystemQualifications.masters[environment],
    comparator: "Exists",
    ...(actionsGuarded && { actionsGuarded }),
  })
}

export function adultRequirement(actionsGuarded?: HITAccessActions): QualificationRequirement {
  return qualificationRequirement({
    qualificationTypeId: SystemQualifications.adult,
    comparator: "EqualTo",
    integerValues: [1],
    ...(actionsGuarded && { actionsGuarded }),
  })
}

export function numberApprovedRequirement(
  comparator: Comparator,
  value: number,
  actionsGuarded?: HITAccessActions,
): QualificationRequirement {
  return qualificationRequirement({
    qualificationTypeId: SystemQualifications.numberApproved,
    comparator,
    integerValues: [integer(value, "approved count")],
    ...(actionsGuarded && { actionsGuarded }),
  })
}

/** `percent` is a whole number between 0 and 100. */
export function percentApprovedRequirement(
  comparator: Comparator,
  percent: number,
  actionsGuarded?: HITAccessActions,
): QualificationRequirement {
  if (percent < 0 || percent > 100) {
    throw CrowdError.invalidRequirement(`approval rate must be between 0 and 100, got ${percent}`)
  }

  return qualificationRequirement({
    qualificationTypeId: SystemQualifications.percentApproved,
    comparator,
    integerValues: [integer(percent, "approval rate")],
    ...(actionsGuarded && { actionsGuarded }),
  })
}

export function localeRequirement(
  comparator: "In" | "NotIn" | "EqualTo" | "NotEqualTo",
  locales: LocaleInput[],
  actionsGuarded?: HITAccessActions,
): QualificationRequirement {
  if (locales.length === 0) {
    throw CrowdError.invalidRequirement("a locale requirement needs at least one locale")
  }
  if ((comparator === "EqualTo" || comparator === "NotEqualTo") && locales.length > 1) {
    throw CrowdError.invalidRequirement(`${comparator} takes exactly one locale, use In or NotIn`)
  }

  return qualificationRequirement({
    qualificationTypeId: SystemQualifications.locale,
    comparator,
    locales,
    ...(actionsGuarded && { actionsGuarded }),
  })
}

function toLocale(input: LocaleInput): Locale {
  if (typeof input === "string") {
    return { Country: input }
  }

  const [country, subdivision] = input
  return { Country: country, Subdivision: subdivision }
}

function integer(value: number, label: string): number {
  if (!Number.isInteger(value)) {
    throw CrowdError.invalidRequirement(`${label} must be an integer, got ${value}`)
  }

  return value
}
