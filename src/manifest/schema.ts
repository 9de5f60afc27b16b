/**
 * Application Manifest Types
 *
 * A manifest describes one deployable application. Manifests are tagged by
 * their `type` field; each application shape gets its own schema here and
 * its own stack template under templates/definitions.
 */

import { z } from 'zod'

export const LB_WEB_APP_TYPE = 'Load Balanced Web App'

const imageSchema = z
  .object({
    /** Path to the Dockerfile, relative to the workspace root */
    build: z.string().min(1).optional(),
    /** Port the container listens on */
    port: z.number().int().min(1).max(65535),
  })
  .strict()

const routingRuleSchema = z
  .object({
    /** Listener path pattern, e.g. "/api/*" or "*" */
    path: z.string().min(1),
  })
  .strict()

const variablesSchema = z.record(z.string().min(1), z.string())

const lbWebAppConfigShape = {
  http: routingRuleSchema.default({ path: '*' }),
  /** CPU units reserved for the task (256 = 0.25 vCPU) */
  cpu: z.number().int().positive(),
  /** Memory reserved for the task, in MiB */
  memory: z.number().int().positive(),
  /** Desired number of running tasks */
  count: z.number().int().nonnegative(),
  variables: variablesSchema.optional(),
}

const lbWebAppOverrideSchema = z
  .object({
    http: routingRuleSchema.partial().optional(),
    cpu: lbWebAppConfigShape.cpu.optional(),
    memory: lbWebAppConfigShape.memory.optional(),
    count: lbWebAppConfigShape.count.optional(),
    variables: variablesSchema.optional(),
  })
  .strict()

export const lbWebAppManifestSchema = z
  .object({
    name: z.string().min(1),
    type: z.literal(LB_WEB_APP_TYPE),
    image: imageSchema,
    ...lbWebAppConfigShape,
    /** Per-environment overrides, keyed by environment name */
    environments: z.record(z.string().min(1), lbWebAppOverrideSchema).optional(),
  })
  .strict()

export type LBWebAppManifest = z.infer<typeof lbWebAppManifestSchema>
export type LBWebAppOverride = z.infer<typeof lbWebAppOverrideSchema>

/** Configuration of a load-balanced web app once environment overrides are applied. */
export type LBWebAppConfig = Pick<LBWebAppManifest, 'http' | 'cpu' | 'memory' | 'count' | 'variables'>

export type AppManifest = LBWebAppManifest
export type AppType = AppManifest['type']

export const manifestSchemas = {
  [LB_WEB_APP_TYPE]: lbWebAppManifestSchema,
} satisfies { [T in AppType]: z.ZodType<Extract<AppManifest, { type: T }>, z.ZodTypeDef, unknown> }

export const APP_TYPES: readonly AppType[] = [LB_WEB_APP_TYPE]

export function isAppType(value: string): value is AppType {
  return APP_TYPES.some(type => type === value)
}
