import { LB_WEB_APP_TYPE, type LBWebAppManifest } from '../../manifest/index.js'
import type { EnvironmentRecord } from '../../services/environments/types.js'
import { imageUrl, resolveEnvConfig, stackNameFor } from '../../stack/params.js'
import { rulePriorityFor } from '../../stack/rulePriority.js'
import type { AppTemplate } from '../schema.js'

export const LB_WEB_APP_PARAM_KEYS = {
  projectName: 'ProjectName',
  envName: 'EnvName',
  appName: 'AppName',
  containerImage: 'ContainerImage',
  containerPort: 'ContainerPort',
  rulePriority: 'RulePriority',
  rulePath: 'RulePath',
  taskCPU: 'TaskCPU',
  taskMemory: 'TaskMemory',
  taskCount: 'TaskCount',
} as const

export interface LBWebAppTemplateParameters {
  stackName: string
  env: EnvironmentRecord
  app: {
    name: string
    type: LBWebAppManifest['type']
    path: string
    cpu: number
    memory: number
    count: number
    variables: Record<string, string>
  }
  image: {
    url: string
    port: number
  }
  imageTag: string
  /** Listener rule priority, see stack/rulePriority.ts */
  priority: number
}

export const lbWebApp: AppTemplate<LBWebAppManifest, LBWebAppTemplateParameters> = {
  type: LB_WEB_APP_TYPE,
  description:
    'Internet-facing service on AWS Fargate, routed by path from the environment load balancer.',
  templatePath: 'lb-web-app/cf.yml',
  paramsPath: 'lb-web-app/params.json',

  toTemplateParameters({ app, env, imageTag, routingRules }) {
    const config = resolveEnvConfig(app, env.name)
    return {
      stackName: stackNameFor(env, app.name),
      env,
      app: {
        name: app.name,
        type: app.type,
        path: config.http.path,
        cpu: config.cpu,
        memory: config.memory,
        count: config.count,
        variables: config.variables ?? {},
      },
      image: {
        url: imageUrl(env, app.name, imageTag),
        port: app.image.port,
      },
      imageTag,
      priority: rulePriorityFor({ app: app.name, path: config.http.path }, routingRules),
    }
  },

  parameters(params) {
    const keys = LB_WEB_APP_PARAM_KEYS
    const entries: Array<[string, string | number]> = [
      [keys.projectName, params.env.project],
      [keys.envName, params.env.name],
      [keys.appName, params.app.name],
      [keys.containerImage, params.image.url],
      [keys.containerPort, params.image.port],
      [keys.rulePriority, params.priority],
      [keys.rulePath, params.app.path],
      [keys.taskCPU, params.app.cpu],
      [keys.taskMemory, params.app.memory],
      [keys.taskCount, params.app.count],
    ]
    return entries.map(([ParameterKey, value]) => ({
      ParameterKey,
      ParameterValue: String(value),
    }))
  },
}
