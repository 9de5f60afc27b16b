import { getAppTemplate } from '../templates/registry.js'
import type { TemplateRenderer } from '../templates/renderer.js'
import { stackNameFor } from './params.js'
import type { StackInput, StackParameter, StackTag } from './types.js'

export const PROJECT_TAG_KEY = 'stackpack-project'
export const ENV_TAG_KEY = 'stackpack-environment'
export const APP_TAG_KEY = 'stackpack-application'

/**
 * Derive the data a stack template is rendered with.
 */
export function buildTemplateParameters(input: StackInput) {
  return getAppTemplate(input.app.type).toTemplateParameters(input)
}

export type TemplateParameters = ReturnType<typeof buildTemplateParameters>

/**
 * CloudFormation stack of one application in one environment.
 */
export class AppStack {
  constructor(
    private readonly input: StackInput,
    private readonly renderer: TemplateRenderer
  ) {}

  private get definition() {
    return getAppTemplate(this.input.app.type)
  }

  stackName(): string {
    return stackNameFor(this.input.env, this.input.app.name)
  }

  templateParameters(): TemplateParameters {
    return buildTemplateParameters(this.input)
  }

  /**
   * CloudFormation template of the application, parametrized for the environment.
   */
  template(): string {
    return this.renderer.render(this.definition.templatePath, this.templateParameters())
  }

  /**
   * The stack's parameters as a YAML document annotated with comments.
   */
  serializedParameters(): string {
    return this.renderer.render(this.definition.paramsPath, this.templateParameters())
  }

  parameters(): StackParameter[] {
    return this.definition.parameters(this.templateParameters())
  }

  tags(): StackTag[] {
    return [
      { Key: PROJECT_TAG_KEY, Value: this.input.env.project },
      { Key: ENV_TAG_KEY, Value: this.input.env.name },
      { Key: APP_TAG_KEY, Value: this.input.app.name },
    ]
  }
}
