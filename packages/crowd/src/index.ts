export { CROWD_FORM_IDENTIFIER, parseAnswers } from "./core/answers/parse-answers"
export {
  MAX_ANNOTATION_LENGTH,
  packAnnotation,
  unpackAnnotation,
} from "./core/annotation/annotation"
export {
  type CrowdEnvironment,
  createMturkClient,
  crowdEnvironments,
  environmentOfEndpoint,
  MTURK_ENDPOINTS,
  MTURK_REGION,
  mturkClientConfig,
  previewUrl,
} from "./core/environment/environment"
export {
  adultRequirement,
  type LocaleInput,
  localeRequirement,
  mastersRequirement,
  numberApprovedRequirement,
  percentApprovedRequirement,
  qualificationRequirement,
  type RequirementOptions,
  SystemQualifications,
} from "./core/qualifications/qualifications"
export {
  renderExternalQuestion,
  renderHtmlQuestion,
  renderTemplate,
} from "./core/questions/questions"
export {
  type CreateTaskClientOptions,
  createTaskClient,
} from "./core/task-client/create-task-client"
export { TaskClient, type TaskClientDeps } from "./core/task-client/task-client"
export { CrowdError, type CrowdErrorCode, isCrowdError } from "./model/crowd.errors"
export type {
  Answers,
  FetchResponsesOptions,
  QuestionSource,
  TaskDefinition,
  TaskHandle,
  TaskInfo,
  TaskResponse,
} from "./ports/task"
