import { Command } from 'commander'
import { SSMClient } from '@aws-sdk/client-ssm'
import type { AppConfig } from '../config/index.js'
import { NoProjectInWorkspaceError, WorkspaceError } from '../errors.js'
import { SSMEnvironmentStore } from '../services/environments/ssmStore.js'
import { defaultImageTag } from '../services/git/imageTag.js'
import { TerminalPrompter } from '../services/prompt/prompter.js'
import { LocalWorkspace } from '../services/workspace/workspace.js'
import { BundledTemplateStore, getAllAppTemplates } from '../templates/index.js'
import { cliLogger } from '../utils/logger.js'
import { PackageAppCommand } from './appPackage.js'

export interface GlobalFlags {
  project?: string
}

export interface AppPackageFlags {
  name?: string
  env?: string
  tag?: string
  outputDir?: string
}

export type PackageAppHandler = (
  flags: AppPackageFlags,
  globals: GlobalFlags,
  config: AppConfig
) => Promise<void>

export interface ResolvedWorkspace {
  workspace: LocalWorkspace
  projectName?: string
}

/**
 * Find the workspace and the project to package for. Outside a workspace and
 * without an explicit project, the missing project is what gets reported.
 */
export async function resolveWorkspace(
  globals: GlobalFlags,
  config: AppConfig,
  discover: () => LocalWorkspace = () => LocalWorkspace.discover()
): Promise<ResolvedWorkspace> {
  const explicitProject = globals.project ?? config.project

  let workspace: LocalWorkspace
  try {
    workspace = discover()
  } catch (error) {
    if (error instanceof WorkspaceError && explicitProject === undefined) {
      throw new NoProjectInWorkspaceError()
    }
    throw error
  }
  return { workspace, projectName: explicitProject ?? (await workspace.projectName()) }
}

/**
 * Wire the real collaborators and run `app package`.
 */
export const runPackageApp: PackageAppHandler = async (flags, globals, config) => {
  const { workspace, projectName } = await resolveWorkspace(globals, config)
  const tag = flags.tag ?? (await defaultImageTag())

  const prompter = new TerminalPrompter()
  const command = new PackageAppCommand(
    { appName: flags.name, envName: flags.env, tag, outputDir: flags.outputDir },
    { projectName },
    {
      workspace,
      envStore: new SSMEnvironmentStore(new SSMClient({}), config.ssmPrefix),
      prompter,
      templates: new BundledTemplateStore(),
    }
  )
  try {
    const result = await command.run()
    for (const file of result.files) {
      cliLogger.info(`Wrote ${file}`)
    }
  } finally {
    prompter.close()
  }
}

function appTypesHelp(): string {
  const lines = getAllAppTemplates().map(template => `  ${template.type}: ${template.description}`)
  return `\nApplication types:\n${lines.join('\n')}`
}

export function buildProgram(
  config: AppConfig,
  packageApp: PackageAppHandler = runPackageApp
): Command {
  const program = new Command()
    .name('stackpack')
    .description('Package workspace applications into CloudFormation stacks')
    .option(
      '-p, --project <name>',
      'project to package for, instead of the workspace project (a workspace is still required)'
    )

  const app = program.command('app').description('Commands for applications')

  app
    .command('package')
    .description('Print the CloudFormation template of an application')
    .option('-n, --name <app>', 'name of the application')
    .option('-e, --env <env>', 'name of the environment')
    .option('--tag <tag>', 'image tag, defaults to manual-{short git sha}')
    .option('--output-dir <dir>', 'write the template and parameter files to this directory')
    .addHelpText(
      'after',
      `
Examples:
  Print the template of the "frontend" application for the "test" environment
  $ stackpack app package -n frontend -e test

  Write the template and parameter files to infrastructure/
  $ stackpack app package --output-dir ./infrastructure --tag 1.4.2`
    )
    .addHelpText('after', appTypesHelp())
    .action(async (flags: AppPackageFlags, command: Command) => {
      const globals = command.optsWithGlobals<GlobalFlags>()
      await packageApp(flags, { project: globals.project }, config)
    })

  return program
}
