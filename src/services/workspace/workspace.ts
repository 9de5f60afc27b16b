import { existsSync, statSync } from 'fs'
import { readdir, readFile } from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import { WorkspaceError, describeError } from '../../errors.js'
import { workspaceLogger } from '../../utils/logger.js'

export const WORKSPACE_DIR_NAME = 'stackpack'
export const WORKSPACE_SUMMARY_FILE = '.workspace.json'
const MANIFEST_FILE_SUFFIX = '-app.yml'
// How many parent directories are searched for a workspace
const MAX_SEARCH_DEPTH = 5

const workspaceSummarySchema = z.object({
  project: z.string().min(1),
})

export interface Workspace {
  /** Names of the applications with a manifest in the workspace, sorted */
  listApplicationNames(): Promise<string[]>
  /** File name of the manifest of `appName` */
  manifestFileName(appName: string): string
  readManifestFile(fileName: string): Promise<Buffer>
}

/**
 * Workspace on the local disk: a `stackpack/` directory holding one
 * `{app}-app.yml` manifest per application and a `.workspace.json` summary
 * naming the project.
 */
export class LocalWorkspace implements Workspace {
  constructor(readonly dir: string) {}

  /**
   * Find the workspace directory in `startDir` or one of its parents.
   */
  static discover(startDir: string = process.cwd()): LocalWorkspace {
    let current = path.resolve(startDir)
    for (let depth = 0; depth <= MAX_SEARCH_DEPTH; depth++) {
      const candidate = path.join(current, WORKSPACE_DIR_NAME)
      if (existsSync(candidate) && statSync(candidate).isDirectory()) {
        workspaceLogger.debug('Found workspace', { dir: candidate })
        return new LocalWorkspace(candidate)
      }
      const parent = path.dirname(current)
      if (parent === current) {
        break
      }
      current = parent
    }
    throw new WorkspaceError(
      `No ${WORKSPACE_DIR_NAME}/ workspace directory found in ${startDir} or its parents`
    )
  }

  /**
   * Project recorded in the workspace summary, if there is one.
   */
  async projectName(): Promise<string | undefined> {
    const summaryPath = path.join(this.dir, WORKSPACE_SUMMARY_FILE)
    if (!existsSync(summaryPath)) {
      return undefined
    }

    let summary: unknown
    try {
      summary = JSON.parse(await readFile(summaryPath, 'utf-8'))
    } catch (error) {
      throw new WorkspaceError(`Failed to read ${summaryPath}: ${describeError(error)}`, error)
    }

    const result = workspaceSummarySchema.safeParse(summary)
    if (!result.success) {
      throw new WorkspaceError(`Workspace summary ${summaryPath} does not name a project`)
    }
    return result.data.project
  }

  async listApplicationNames(): Promise<string[]> {
    let entries
    try {
      entries = await readdir(this.dir, { withFileTypes: true })
    } catch (error) {
      throw new WorkspaceError(
        `Failed to list applications in ${this.dir}: ${describeError(error)}`,
        error
      )
    }

    return entries
      .filter(entry => entry.isFile() && entry.name.endsWith(MANIFEST_FILE_SUFFIX))
      .map(entry => entry.name.slice(0, -MANIFEST_FILE_SUFFIX.length))
      .filter(name => name.length > 0)
      .sort()
  }

  manifestFileName(appName: string): string {
    return `${appName}${MANIFEST_FILE_SUFFIX}`
  }

  async readManifestFile(fileName: string): Promise<Buffer> {
    const filePath = path.join(this.dir, fileName)
    try {
      return await readFile(filePath)
    } catch (error) {
      throw new WorkspaceError(`Failed to read manifest ${filePath}: ${describeError(error)}`, error)
    }
  }
}
