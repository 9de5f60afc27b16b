export type { RoutingRule, StackInput, StackParameter, StackTag } from './types.js'

export {
  AppStack,
  buildTemplateParameters,
  PROJECT_TAG_KEY,
  ENV_TAG_KEY,
  APP_TAG_KEY,
  type TemplateParameters,
} from './appStack.js'
export {
  MAX_STACK_NAME_LENGTH,
  stackNameFor,
  imageLocation,
  imageUrl,
  resolveEnvConfig,
} from './params.js'
export { allocateRulePriorities, rulePriorityFor } from './rulePriority.js'
