#!/usr/bin/env tsx

import { Command } from 'commander'
import { realpathSync } from 'node:fs'
import { pathToFileURL } from 'node:url'
import process from 'node:process'

import type { HubContextOverrides } from '@scoreboard-hub/core'

import {
  commandBackups,
  commandBoards,
  commandConfigGet,
  commandConfigReplace,
  commandConfigSet,
  commandConfigUnset,
  commandConfigValidate,
  commandControl,
  commandDoctor,
  commandLogs,
  commandPluginsDisable,
  commandPluginsEnable,
  commandPluginsInstall,
  commandPluginsList,
  commandPluginsUninstall,
  commandPluginsUpgrade,
  commandProcesses,
  commandRecover,
  commandStatus,
  type CommandContext,
} from './commands.js'
import type { GlobalOptions } from './lib/index.js'

/** `overrides` replaces parts of the hub, for tests and embedding. */
export function createProgram(overrides?: HubContextOverrides): Command {
  const program = new Command()
    .name('scoreboard-hub')
    .description('Transactional configuration and plugin management for the scoreboard')
    .option('--dir <path>', 'Scoreboard installation directory (default: SCOREBOARD_DIR or .)')
    .option('--env-file <path>', 'Hub settings file (default: <dir>/.hub/hub.env when present)')
    .option('--supervisor-url <host>', 'Supervisor XML-RPC host')
    .option('--supervisor-port <port>', 'Supervisor XML-RPC port')
    .option('--process <name>', 'Supervised scoreboard process name')
    .option('--json', 'Emit JSON output')

  const context = (command: Command): CommandContext => ({
    options: command.optsWithGlobals<GlobalOptions>(),
    overrides,
  })

  program
    .command('status')
    .description('Show scoreboard version, hub revision and process status')
    .action(async (_opts: object, command: Command) => {
      await commandStatus(context(command))
    })

  const config = program.command('config').description('Read and change the scoreboard configuration')

  config
    .command('get [key]')
    .description('Print the whole configuration or one dotted key')
    .action(async (key: string | undefined, _opts: object, command: Command) => {
      await commandConfigGet(context(command), key)
    })

  config
    .command('set <assignments...>')
    .description('Set dotted keys; values are read as JSON, falling back to strings')
    .action(async (assignments: string[], _opts: object, command: Command) => {
      await commandConfigSet(context(command), assignments)
    })

  config
    .command('unset <keys...>')
    .description('Remove dotted keys')
    .action(async (keys: string[], _opts: object, command: Command) => {
      await commandConfigUnset(context(command), keys)
    })

  config
    .command('replace <file>')
    .description('Replace every value with the JSON object in <file>')
    .action(async (file: string, _opts: object, command: Command) => {
      await commandConfigReplace(context(command), file)
    })

  config
    .command('validate')
    .description('Check the canonical configuration against the current schema')
    .action(async (_opts: object, command: Command) => {
      await commandConfigValidate(context(command))
    })

  const plugins = program.command('plugins').description('Manage scoreboard plugins')

  plugins
    .command('list')
    .description('List installed and indexed plugins')
    .action(async (_opts: object, command: Command) => {
      await commandPluginsList(context(command))
    })

  plugins
    .command('install <source>')
    .description('Install a plugin from a directory or .tgz archive; it starts disabled')
    .action(async (source: string, _opts: object, command: Command) => {
      await commandPluginsInstall(context(command), source)
    })

  plugins
    .command('upgrade <source>')
    .description('Replace an installed plugin with a newer package')
    .action(async (source: string, _opts: object, command: Command) => {
      await commandPluginsUpgrade(context(command), source)
    })

  plugins
    .command('enable <id>')
    .description('Enable a plugin and the plugins it depends on')
    .action(async (id: string, _opts: object, command: Command) => {
      await commandPluginsEnable(context(command), id)
    })

  plugins
    .command('disable <id>')
    .description('Disable a plugin no enabled plugin depends on')
    .action(async (id: string, _opts: object, command: Command) => {
      await commandPluginsDisable(context(command), id)
    })

  plugins
    .command('uninstall <id>')
    .description('Remove a plugin and, unless --keep-config, its values')
    .option('--keep-config', 'Keep the values the plugin contributed')
    .action(async (id: string, opts: { keepConfig?: boolean }, command: Command) => {
      await commandPluginsUninstall(context(command), id, opts)
    })

  program
    .command('boards')
    .description('List built-in and plugin boards')
    .action(async (_opts: object, command: Command) => {
      await commandBoards(context(command))
    })

  program
    .command('backups')
    .description('List backups of the canonical configuration')
    .action(async (_opts: object, command: Command) => {
      await commandBackups(context(command))
    })

  program
    .command('processes')
    .description('List the processes supervisord manages')
    .action(async (_opts: object, command: Command) => {
      await commandProcesses(context(command))
    })

  program
    .command('start')
    .description('Start the scoreboard; refused while a change is in progress')
    .action(async (_opts: object, command: Command) => {
      await commandControl(context(command), 'start')
    })

  program
    .command('stop')
    .description('Stop the scoreboard; refused while a change is in progress')
    .action(async (_opts: object, command: Command) => {
      await commandControl(context(command), 'stop')
    })

  program
    .command('recover')
    .description('Clean up after an interrupted transaction and restart the scoreboard')
    .action(async (_opts: object, command: Command) => {
      await commandRecover(context(command))
    })

  program
    .command('logs')
    .description("Print the end of the scoreboard's stderr log")
    .option('--bytes <n>', 'Number of bytes to print', '4000')
    .action(async (opts: { bytes?: string }, command: Command) => {
      await commandLogs(context(command), opts)
    })

  program
    .command('doctor')
    .description('Run basic diagnostics')
    .action(async (_opts: object, command: Command) => {
      await commandDoctor(context(command))
    })

  return program
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv)
}

const isDirectRun = (() => {
  if (typeof process.argv[1] !== 'string') return false
  try {
    return import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href
  } catch {
    return import.meta.url === pathToFileURL(process.argv[1]).href
  }
})()

if (isDirectRun) {
  runCli().catch((error) => {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`error: ${message}`)
    process.exit(1)
  })
}
