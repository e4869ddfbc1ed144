import { isDataError } from "@stowage/storage"
import { answerXml, thrown } from "../../../tests/utils/fake-mturk-client"
import { parseAnswers } from "../parse-answers"

describe("parseAnswers", () => {
  it("parses JSON free text and keeps other text as strings", () => {
    const xml = answerXml([
      { id: "score", freeText: "4" },
      { id: "label", freeText: '{"name":"cat","box":[1,2]}' },
      { id: "comment", freeText: "looks fine" },
    ])

    expect(parseAnswers(xml)).toEqual({
      score: 4,
      label: { name: "cat", box: [1, 2] },
      comment: "looks fine",
    })
  })

  it("keeps free text exactly, including surrounding whitespace", () => {
    const xml = answerXml([
      { id: "q", freeText: "  two spaces  " },
      { id: "lines", freeText: "\nfirst\nsecond\n" },
    ])

    expect(parseAnswers(xml)).toEqual({ q: "  two spaces  ", lines: "\nfirst\nsecond\n" })
  })

  it("ignores indentation between elements", () => {
    const xml = [
      '<?xml version="1.0" encoding="ASCII"?>',
      "<QuestionFormAnswers>",
      "  <Answer>",
      "    <QuestionIdentifier>pet</QuestionIdentifier>",
      "    <SelectionIdentifier>dog</SelectionIdentifier>",
      "  </Answer>",
      "  <Answer>",
      "    <QuestionIdentifier>note</QuestionIdentifier>",
      "    <FreeText> ok </FreeText>",
      "  </Answer>",
      "</QuestionFormAnswers>",
    ].join("\n")

    expect(parseAnswers(xml)).toEqual({ pet: ["dog"], note: " ok " })
  })

  it("returns an empty mapping for an indented document without answers", () => {
    expect(parseAnswers("<QuestionFormAnswers>\n  \n</QuestionFormAnswers>")).toEqual({})
  })

  it("decodes entities in free text", () => {
    const xml = answerXml([{ id: "note", freeText: "a < b & c" }])

    expect(parseAnswers(xml)).toEqual({ note: "a < b & c" })
  })

  it("collects selection answers into arrays", () => {
    const xml = answerXml([
      { id: "colors", selections: ["red", "blue"] },
      { id: "size", selections: ["large"] },
    ])

    expect(parseAnswers(xml)).toEqual({ colors: ["red", "blue"], size: ["large"] })
  })

  it("appends other-selection text to the selections", () => {
    const xml =
      "<QuestionFormAnswers><Answer><QuestionIdentifier>pet</QuestionIdentifier>" +
      "<SelectionIdentifier>dog</SelectionIdentifier>" +
      "<OtherSelectionText>ferret</OtherSelectionText></Answer></QuestionFormAnswers>"

    expect(parseAnswers(xml)).toEqual({ pet: ["dog", "ferret"] })
  })

  it("maps an answer without a value to an empty selection", () => {
    const xml = answerXml([{ id: "skipped", selections: [] }])

    expect(parseAnswers(xml)).toEqual({ skipped: [] })
  })

  it("returns an empty mapping for a document without answers", () => {
    expect(parseAnswers(answerXml([]))).toEqual({})
  })

  it("unwraps crowd-form task answers and parses JSON string fields", () => {
    const body = JSON.stringify([{ sentiment: { label: "positive" }, count: "3", note: "ok" }])
    const xml = answerXml([{ id: "taskAnswers", freeText: body }])

    expect(parseAnswers(xml)).toEqual({ sentiment: { label: "positive" }, count: 3, note: "ok" })
  })

  it("keeps crowd-form answers that are not a single object", () => {
    const xml = answerXml([{ id: "taskAnswers", freeText: "[1,2]" }])

    expect(parseAnswers(xml)).toEqual({ taskAnswers: [1, 2] })
  })

  it("rejects crowd-form answers that are not JSON", () => {
    const xml = answerXml([{ id: "taskAnswers", freeText: "not json" }])

    expect(thrown(() => parseAnswers(xml))).toMatchObject({
      code: "decode_error",
      context: { format: "answer-xml" },
    })
  })

  it("rejects malformed XML with the parser's location", () => {
    const err = thrown(() => parseAnswers("<QuestionFormAnswers>\n<Answer></QuestionFormAnswers>"))

    expect(isDataError(err, "decode_error")).toBe(true)
    expect(err).toMatchObject({ context: { line: 2 } })
  })

  it("rejects well-formed XML of another shape", () => {
    expect(thrown(() => parseAnswers("<Other><Answer/></Other>"))).toMatchObject({
      code: "decode_error",
    })
  })
})
