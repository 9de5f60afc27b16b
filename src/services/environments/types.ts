import { z } from 'zod'

export const environmentRecordSchema = z.object({
  /** Project the environment belongs to */
  project: z.string().min(1),
  /** Environment name, e.g. "test" or "prod" */
  name: z.string().min(1),
  /** AWS account the environment is deployed to */
  accountId: z.string().min(1),
  region: z.string().min(1),
  /** Whether the environment serves production traffic */
  prod: z.boolean().default(false),
})

export type EnvironmentRecord = z.infer<typeof environmentRecordSchema>

/**
 * Read access to the environments of a project.
 */
export interface EnvironmentStore {
  /** @throws EnvironmentLookupError if the environment does not exist or cannot be read */
  getEnvironment(project: string, name: string): Promise<EnvironmentRecord>
  listEnvironments(project: string): Promise<EnvironmentRecord[]>
}
