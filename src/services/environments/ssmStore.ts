import {
  GetParameterCommand,
  GetParametersByPathCommand,
  ParameterNotFound,
  SSMClient,
  type GetParametersByPathCommandOutput,
  type Parameter,
} from '@aws-sdk/client-ssm'
import { EnvironmentLookupError, describeError } from '../../errors.js'
import { environmentLogger } from '../../utils/logger.js'
import { environmentRecordSchema, type EnvironmentRecord, type EnvironmentStore } from './types.js'

/**
 * Environment store backed by SSM Parameter Store.
 *
 * Each environment is a JSON document stored under
 *   {prefix}/projects/{project}/environments/{name}
 */
export class SSMEnvironmentStore implements EnvironmentStore {
  constructor(
    private readonly client: SSMClient = new SSMClient({}),
    private readonly prefix: string = '/stackpack'
  ) {}

  private environmentsPath(project: string): string {
    return `${this.prefix}/projects/${project}/environments`
  }

  async getEnvironment(project: string, name: string): Promise<EnvironmentRecord> {
    const parameterName = `${this.environmentsPath(project)}/${name}`

    let parameter: Parameter | undefined
    try {
      const output = await this.client.send(new GetParameterCommand({ Name: parameterName }))
      parameter = output.Parameter
    } catch (error) {
      if (error instanceof ParameterNotFound) {
        throw new EnvironmentLookupError(
          `Environment "${name}" does not exist in project "${project}"`,
          error,
          'ENVIRONMENT_NOT_FOUND'
        )
      }
      throw new EnvironmentLookupError(
        `Failed to get environment "${name}" of project "${project}": ${describeError(error)}`,
        error
      )
    }

    if (parameter?.Value === undefined) {
      throw new EnvironmentLookupError(
        `Environment "${name}" does not exist in project "${project}"`,
        undefined,
        'ENVIRONMENT_NOT_FOUND'
      )
    }
    return this.parseEnvironment(parameterName, parameter.Value)
  }

  async listEnvironments(project: string): Promise<EnvironmentRecord[]> {
    const path = this.environmentsPath(project)
    const environments: EnvironmentRecord[] = []

    let nextToken: string | undefined
    do {
      let output: GetParametersByPathCommandOutput
      try {
        output = await this.client.send(
          new GetParametersByPathCommand({ Path: path, Recursive: false, NextToken: nextToken })
        )
      } catch (error) {
        throw new EnvironmentLookupError(
          `Failed to list environments of project "${project}": ${describeError(error)}`,
          error
        )
      }

      for (const parameter of output.Parameters ?? []) {
        if (parameter.Name === undefined || parameter.Value === undefined) {
          continue
        }
        environments.push(this.parseEnvironment(parameter.Name, parameter.Value))
      }
      nextToken = output.NextToken
    } while (nextToken)

    environmentLogger.debug('Listed environments', { project, count: environments.length })
    return environments
  }

  private parseEnvironment(parameterName: string, value: string): EnvironmentRecord {
    let json: unknown
    try {
      json = JSON.parse(value)
    } catch (error) {
      throw new EnvironmentLookupError(
        `Environment parameter ${parameterName} is not valid JSON: ${describeError(error)}`,
        error
      )
    }

    const result = environmentRecordSchema.safeParse(json)
    if (!result.success) {
      const problems = result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')
      throw new EnvironmentLookupError(
        `Environment parameter ${parameterName} is invalid: ${problems}`,
        result.error
      )
    }
    return result.data
  }
}
