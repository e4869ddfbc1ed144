import { DataError, type JsonValue } from "@stowage/storage"
import { XMLParser, XMLValidator } from "fast-xml-parser"
import { z } from "zod"
import type { Answers } from "../../ports/task"

const FORMAT = "answer-xml"

/** Question identifier used by crowd-form (`<crowd-form>`) HTML tasks. */
export const CROWD_FORM_IDENTIFIER = "taskAnswers"

const answerSchema = z.object({
  QuestionIdentifier: z.string().min(1),
  FreeText: z.string().optional(),
  SelectionIdentifier: z.array(z.string()).optional(),
  OtherSelectionText: z.string().optional(),
})

const documentSchema = z.object({
  // an answerless document parses to its whitespace text
  QuestionFormAnswers: z.union([
    z.string().regex(/^\s*$/),
    z.object({ Answer: z.array(answerSchema).optional() }),
  ]),
})

type AnswerElement = z.infer<typeof answerSchema>

const parser = new XMLParser({
  ignoreDeclaration: true,
  removeNSPrefix: true,
  parseTagValue: false,
  // worker text is kept exactly; whitespace between elements lands in "#text", which the schema drops
  trimValues: false,
  isArray: (name) => name === "Answer" || name === "SelectionIdentifier",
})

/**
 * Decodes a `QuestionFormAnswers` document into a flat mapping of question
 * identifier to answer.
 *
 * FreeText answers that hold JSON are parsed, others stay strings. Selection
 * answers become arrays of selection identifiers. A single crowd-form
 * `taskAnswers` answer is unwrapped into its fields.
 */
export function parseAnswers(xml: string): Answers {
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    throw DataError.decodeError(FORMAT, validation.err.msg, {
      line: validation.err.line,
      position: validation.err.col,
    })
  }

  const parsed = documentSchema.safeParse(parser.parse(xml))
  if (!parsed.success) {
    throw DataError.decodeError(FORMAT, "not a QuestionFormAnswers document", {
      cause: parsed.error,
    })
  }

  const root = parsed.data.QuestionFormAnswers
  const answers = typeof root === "string" ? [] : (root.Answer ?? [])

  const [only] = answers
  if (answers.length === 1 && only?.QuestionIdentifier === CROWD_FORM_IDENTIFIER) {
    return parseCrowdForm(only.FreeText ?? "")
  }

  const result: Answers = {}
  for (const answer of answers) {
    result[answer.QuestionIdentifier] = answerValue(answer)
  }

  return result
}

function answerValue(answer: AnswerElement): JsonValue {
  if (answer.FreeText !== undefined) {
    return parseLenient(answer.FreeText)
  }

  const selections = [...(answer.SelectionIdentifier ?? [])]
  if (answer.OtherSelectionText !== undefined) {
    selections.push(answer.OtherSelectionText)
  }

  return selections
}

function parseCrowdForm(text: string): Answers {
  let body: JsonValue
  try {
    body = JSON.parse(text)
  } catch (err) {
    throw DataError.decodeError(FORMAT, `${CROWD_FORM_IDENTIFIER} is not valid JSON`, {
      cause: err,
    })
  }

  // crowd-form wraps its fields in a one-element list
  const [fields] = Array.isArray(body) && body.length === 1 ? body : []
  if (!isJsonObject(fields)) {
    return { [CROWD_FORM_IDENTIFIER]: body }
  }

  const result: Answers = {}
  for (const [key, value] of Object.entries(fields)) {
    result[key] = typeof value === "string" ? parseLenient(value) : value
  }

  return result
}

function parseLenient(text: string): JsonValue {
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

function isJsonObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
