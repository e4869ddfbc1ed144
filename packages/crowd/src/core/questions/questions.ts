import Handlebars from "handlebars"

const HTML_QUESTION_SCHEMA =
  "http://mechanicalturk.amazonaws.com/AWSMechanicalTurkDataSchemas/2011-11-11/HTMLQuestion.xsd"
const EXTERNAL_QUESTION_SCHEMA =
  "http://mechanicalturk.amazonaws.com/AWSMechanicalTurkDataSchemas/2006-07-14/ExternalQuestion.xsd"

const templates = Handlebars.create()

// {{json value}} embeds a value as a JSON literal, e.g. inside a <script> block
templates.registerHelper("json", (value: unknown) => new Handlebars.SafeString(JSON.stringify(value)))
templates.registerHelper("eq", (a: unknown, b: unknown) => a === b)

/** Renders a Handlebars template. HTML in arguments is escaped unless `{{{triple}}}`-braced. */
export function renderTemplate(template: string, args: Record<string, unknown> = {}): string {
  return templates.compile(template)(args)
}

/**
 * Wraps HTML in an HTMLQuestion document. A frame height of 0 lets the
 * worker site size the frame to the content.
 */
export function renderHtmlQuestion(html: string, frameHeight = 0): string {
  return [
    `<HTMLQuestion xmlns="${HTML_QUESTION_SCHEMA}">`,
    `<HTMLContent><![CDATA[${escapeCdata(html)}]]></HTMLContent>`,
    `<FrameHeight>${frameHeight}</FrameHeight>`,
    "</HTMLQuestion>",
  ].join("\n")
}

export function renderExternalQuestion(url: string, frameHeight = 0): string {
  return [
    `<ExternalQuestion xmlns="${EXTERNAL_QUESTION_SCHEMA}">`,
    `<ExternalURL>${escapeXml(url)}</ExternalURL>`,
    `<FrameHeight>${frameHeight}</FrameHeight>`,
    "</ExternalQuestion>",
  ].join("\n")
}

// "]]>" cannot appear inside a CDATA section, so split it across two
function escapeCdata(text: string): string {
  return text.replaceAll("]]>", "]]]]><![CDATA[>")
}

const XML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
}

function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch)
}
