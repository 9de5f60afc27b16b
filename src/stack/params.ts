import type { LBWebAppConfig, LBWebAppManifest } from '../manifest/index.js'
import type { EnvironmentRecord } from '../services/environments/types.js'

const ECR_URL_FORMAT = (accountId: string, region: string, location: string) =>
  `${accountId}.dkr.ecr.${region}.amazonaws.com/${location}`

// CloudFormation stack name limit
export const MAX_STACK_NAME_LENGTH = 128

/**
 * Name of the stack deploying `appName` to `env`, right-truncated to the last
 * MAX_STACK_NAME_LENGTH characters when it would be too long.
 */
export function stackNameFor(env: EnvironmentRecord, appName: string): string {
  const stackName = `${env.project}-${env.name}-${appName}-app`
  if (stackName.length > MAX_STACK_NAME_LENGTH) {
    return stackName.slice(stackName.length - MAX_STACK_NAME_LENGTH)
  }
  return stackName
}

/**
 * Repository location of the application image: `{project}/{env}/{app}:{tag}`.
 */
export function imageLocation(env: EnvironmentRecord, appName: string, imageTag: string): string {
  return `${env.project}/${env.name}/${appName}:${imageTag}`
}

export function imageUrl(env: EnvironmentRecord, appName: string, imageTag: string): string {
  return ECR_URL_FORMAT(env.accountId, env.region, imageLocation(env, appName, imageTag))
}

/**
 * Configuration of the app in `envName`: fields set in the environment's override
 * replace the base value, `http` and `variables` are merged key by key.
 */
export function resolveEnvConfig(manifest: LBWebAppManifest, envName: string): LBWebAppConfig {
  const base: LBWebAppConfig = {
    http: manifest.http,
    cpu: manifest.cpu,
    memory: manifest.memory,
    count: manifest.count,
    variables: manifest.variables,
  }

  const overrides = manifest.environments
  if (!overrides || !Object.hasOwn(overrides, envName)) {
    return base
  }

  const override = overrides[envName]
  return {
    http: { ...base.http, ...override.http },
    cpu: override.cpu ?? base.cpu,
    memory: override.memory ?? base.memory,
    count: override.count ?? base.count,
    variables:
      base.variables || override.variables
        ? { ...base.variables, ...override.variables }
        : undefined,
  }
}
