import type { AppManifest } from '../manifest/index.js'
import type { EnvironmentRecord } from '../services/environments/types.js'

/** A listener rule claimed by one application of the workspace. */
export interface RoutingRule {
  app: string
  path: string
}

export interface StackInput<M extends AppManifest = AppManifest> {
  app: M
  env: EnvironmentRecord
  imageTag: string
  /** Rules of every application sharing the environment's load balancer */
  routingRules?: RoutingRule[]
}

export interface StackParameter {
  ParameterKey: string
  ParameterValue: string
}

export interface StackTag {
  Key: string
  Value: string
}
