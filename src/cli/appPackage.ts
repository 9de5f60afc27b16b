import { mkdir, rm } from 'fs/promises'
import path from 'path'
import {
  EnvironmentLookupError,
  NoApplicationsFoundError,
  NoProjectInWorkspaceError,
  OutputIOError,
  PromptError,
  UnknownApplicationError,
  describeError,
} from '../errors.js'
import { decodeManifest, type AppManifest } from '../manifest/index.js'
import type { EnvironmentStore } from '../services/environments/types.js'
import { DiscardSink, FileSink, StreamSink, type OutputSink } from '../services/output/sinks.js'
import type { Prompter } from '../services/prompt/prompter.js'
import type { Workspace } from '../services/workspace/workspace.js'
import { AppStack, resolveEnvConfig, type RoutingRule } from '../stack/index.js'
import { TemplateRenderer, type TemplateStore } from '../templates/index.js'
import { cliLogger, type Logger } from '../utils/logger.js'

export const APP_NAME_PROMPT =
  'Which application would you like to generate a CloudFormation template for?'
export const ENV_NAME_PROMPT = 'Which environment would you like to create this stack for?'

export interface PackageAppOptions {
  appName?: string
  envName?: string
  /** Image tag the stack deploys */
  tag: string
  /** Write both documents here instead of printing the template */
  outputDir?: string
}

/** Project the command runs for, resolved once by the caller */
export interface ProjectContext {
  projectName?: string
}

export interface PackageAppDeps {
  workspace: Workspace
  envStore: EnvironmentStore
  prompter: Prompter
  templates: TemplateStore
  /** Receives the template when no output directory is set; stdout by default */
  stdout?: OutputSink
  /** Opens an output file; `FileSink.create` by default */
  createFile?: (path: string) => Promise<OutputSink>
  logger?: Logger
}

export interface PackageResult {
  stackName: string
  /** Files written by the run, empty when printing to stdout */
  files: string[]
}

interface Selection {
  projectName: string
  appName: string
  envName: string
}

interface OpenedSinks {
  template: OutputSink
  params: OutputSink
  files: string[]
}

/**
 * `app package`: render the CloudFormation template and parameter document of
 * one workspace application for one environment.
 */
export class PackageAppCommand {
  private readonly options: PackageAppOptions
  private readonly logger: Logger

  constructor(
    options: PackageAppOptions,
    private readonly context: ProjectContext,
    private readonly deps: PackageAppDeps
  ) {
    this.options = { ...options }
    this.logger = deps.logger ?? cliLogger
  }

  get appName(): string | undefined {
    return this.options.appName
  }

  get envName(): string | undefined {
    return this.options.envName
  }

  async run(): Promise<PackageResult> {
    await this.validate()
    await this.ask()
    await this.validate()
    return this.execute()
  }

  /**
   * Check the names that have been supplied so far.
   */
  async validate(): Promise<void> {
    const projectName = this.requireProject()

    if (this.options.appName !== undefined) {
      const names = await this.deps.workspace.listApplicationNames()
      if (!names.includes(this.options.appName)) {
        throw new UnknownApplicationError(this.options.appName)
      }
    }

    if (this.options.envName !== undefined) {
      await this.deps.envStore.getEnvironment(projectName, this.options.envName)
    }
  }

  /**
   * Prompt for the application and environment names that are still missing.
   */
  async ask(): Promise<Selection> {
    const projectName = this.requireProject()

    if (this.options.appName === undefined) {
      const names = await this.deps.workspace.listApplicationNames()
      if (names.length === 0) {
        throw new NoApplicationsFoundError()
      }
      this.options.appName = await this.select('application name', APP_NAME_PROMPT, names)
    }

    if (this.options.envName === undefined) {
      const environments = await this.deps.envStore.listEnvironments(projectName)
      if (environments.length === 0) {
        throw new EnvironmentLookupError(
          `No environments found in project "${projectName}", add an environment first`
        )
      }
      this.options.envName = await this.select(
        'environment name',
        ENV_NAME_PROMPT,
        environments.map(env => env.name)
      )
    }

    return { projectName, appName: this.options.appName, envName: this.options.envName }
  }

  async execute(): Promise<PackageResult> {
    const { projectName, appName, envName } = await this.ask()

    const env = await this.deps.envStore.getEnvironment(projectName, envName)
    const app = await this.readManifest(appName)
    const routingRules = await this.collectRoutingRules(appName, envName)

    const stack = new AppStack(
      { app, env, imageTag: this.options.tag, routingRules },
      new TemplateRenderer(this.deps.templates)
    )
    const stackName = stack.stackName()
    const template = stack.template()
    const params = stack.serializedParameters()

    const files = await this.writeOutputs(appName, envName, template, params)

    this.logger.info('Packaged application', {
      operation: 'app package',
      app: appName,
      env: envName,
      stackName,
      files,
    })
    return { stackName, files }
  }

  private requireProject(): string {
    if (this.context.projectName === undefined) {
      throw new NoProjectInWorkspaceError()
    }
    return this.context.projectName
  }

  private async select(subject: string, message: string, options: string[]): Promise<string> {
    // A single choice is offered as the default
    const defaultValue = options.length === 1 ? options[0] : ''
    try {
      return await this.deps.prompter.selectOne(message, defaultValue, options)
    } catch (error) {
      throw new PromptError(`Failed to select ${subject}: ${describeError(error)}`, error)
    }
  }

  private async readManifest(appName: string): Promise<AppManifest> {
    const raw = await this.deps.workspace.readManifestFile(
      this.deps.workspace.manifestFileName(appName)
    )
    return decodeManifest(raw)
  }

  /**
   * Routing rules of the other workspace applications in `envName`. Manifests
   * that cannot be read are left out.
   */
  private async collectRoutingRules(appName: string, envName: string): Promise<RoutingRule[]> {
    const rules: RoutingRule[] = []
    for (const name of await this.deps.workspace.listApplicationNames()) {
      if (name === appName) {
        continue
      }
      try {
        const sibling = await this.readManifest(name)
        rules.push({ app: sibling.name, path: resolveEnvConfig(sibling, envName).http.path })
      } catch (error) {
        this.logger.warn(
          'Skipping application manifest',
          { operation: 'collect routing rules', app: name },
          toError(error)
        )
      }
    }
    return rules
  }

  private async writeOutputs(
    appName: string,
    envName: string,
    template: string,
    params: string
  ): Promise<string[]> {
    const sinks = await this.openSinks(appName, envName)
    try {
      await sinks.template.write(template)
      await sinks.params.write(params)
      await this.closeAll([sinks.template, sinks.params])
    } catch (error) {
      await this.abandon(sinks)
      throw error
    }
    return sinks.files
  }

  private async openSinks(appName: string, envName: string): Promise<OpenedSinks> {
    const outputDir = this.options.outputDir
    if (outputDir === undefined) {
      return {
        template: this.deps.stdout ?? new StreamSink(process.stdout),
        params: new DiscardSink(),
        files: [],
      }
    }

    try {
      await mkdir(outputDir, { recursive: true })
    } catch (error) {
      throw new OutputIOError(
        `Failed to create directory ${outputDir}: ${describeError(error)}`,
        outputDir,
        error
      )
    }

    const templatePath = path.join(outputDir, `${appName}.stack.yml`)
    const paramsPath = path.join(outputDir, `${appName}-${envName}.params.json`)

    const createFile = this.deps.createFile ?? FileSink.create
    const template = await createFile(templatePath)
    let params: OutputSink
    try {
      params = await createFile(paramsPath)
    } catch (error) {
      await this.abandon({ template, params: new DiscardSink(), files: [templatePath] })
      throw error
    }
    return { template, params, files: [templatePath, paramsPath] }
  }

  /**
   * Close the sinks of a failed run and remove the files it created. The
   * failure that caused this is the one raised, close and removal errors are
   * only logged.
   */
  private async abandon(sinks: OpenedSinks): Promise<void> {
    const closed = await Promise.allSettled([sinks.template.close(), sinks.params.close()])
    for (const result of closed) {
      if (result.status === 'rejected') {
        this.logger.warn(
          'Failed to close output',
          { operation: 'app package' },
          toError(result.reason)
        )
      }
    }

    const removed = await Promise.allSettled(sinks.files.map(file => rm(file, { force: true })))
    removed.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn(
          'Failed to remove output file',
          { operation: 'app package', file: sinks.files[index] },
          toError(result.reason)
        )
      }
    })
  }

  /**
   * Close every sink, raising the first failure once all have been tried.
   */
  private async closeAll(sinks: OutputSink[]): Promise<void> {
    const results = await Promise.allSettled(sinks.map(sink => sink.close()))
    const failure = results.find(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    )
    if (failure) {
      throw failure.reason
    }
  }
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
