import yargs from 'yargs'
import {
  acceptCommand,
  addScenarioCommand,
  archiveCommand,
  checkCommand,
  deltaCommand,
  initCommand,
  listCommand,
  locateCommand,
  queryCommand,
  removeRequirementCommand,
  renameRequirementCommand,
  showCommand,
  syncCommand,
  validateCommand,
} from './commands.js'

export * from './commands.js'

const ITEM_TYPES = ['spec', 'change'] as const

/**
 * Build the `specloom` command line for the given arguments.
 * Failures reject the promise returned by `parseAsync()`.
 */
export function createCli(args: string[]) {
  return yargs(args)
    .scriptName('specloom')
    .option('dir', {
      alias: 'd',
      describe: 'Directory inside the project (specloom.yaml is searched upwards from here)',
      type: 'string',
      default: process.env.SPECLOOM_PROJECT_DIR ?? '.',
    })
    .option('json', {
      describe: 'Print JSON instead of text',
      type: 'boolean',
      default: false,
    })
    .command(
      'init',
      'Create the specloom directory layout',
      () => {},
      async (argv) => {
        await initCommand(argv)
      }
    )
    .command(
      'list',
      'List active changes, specs or archived changes',
      (command) =>
        command
          .option('specs', { type: 'boolean', default: false, describe: 'List specs' })
          .option('archived', { type: 'boolean', default: false, describe: 'List archived changes' }),
      async (argv) => {
        await listCommand(argv)
      }
    )
    .command(
      'show <item>',
      'Show a spec or a change',
      (command) =>
        command
          .positional('item', { type: 'string', demandOption: true, describe: 'Spec or change ID' })
          .option('type', { choices: ITEM_TYPES, describe: 'Disambiguate the item' }),
      async (argv) => {
        await showCommand(argv)
      }
    )
    .command(
      'validate [item]',
      'Validate a spec or change, or everything',
      (command) =>
        command
          .positional('item', { type: 'string', describe: 'Spec or change ID' })
          .option('type', { choices: ITEM_TYPES, describe: 'Disambiguate the item' })
          .option('strict', { type: 'boolean', default: false, describe: 'Treat warnings as errors' }),
      async (argv) => {
        if (!(await validateCommand(argv))) process.exitCode = 1
      }
    )
    .command(
      'query <file> <selector>',
      'Find nodes of a markdown file, e.g. "h2 > task[checked=false]"',
      (command) =>
        command
          .positional('file', { type: 'string', demandOption: true })
          .positional('selector', { type: 'string', demandOption: true }),
      async (argv) => {
        await queryCommand(argv)
      }
    )
    .command(
      'locate <file> <line>',
      'Show the section, requirement and scenario at a line of a markdown file',
      (command) =>
        command
          .positional('file', { type: 'string', demandOption: true })
          .positional('line', { type: 'number', demandOption: true }),
      async (argv) => {
        await locateCommand(argv)
      }
    )
    .command(
      'delta <file>',
      'Show the operations of a delta spec',
      (command) => command.positional('file', { type: 'string', demandOption: true }),
      async (argv) => {
        await deltaCommand(argv)
      }
    )
    .command(
      'rename-requirement <spec> <from> <to>',
      'Rename a requirement of a spec',
      (command) =>
        command
          .positional('spec', { type: 'string', demandOption: true })
          .positional('from', { type: 'string', demandOption: true })
          .positional('to', { type: 'string', demandOption: true }),
      async (argv) => {
        await renameRequirementCommand(argv)
      }
    )
    .command(
      'remove-requirement <spec> <name>',
      'Remove a requirement from a spec',
      (command) =>
        command
          .positional('spec', { type: 'string', demandOption: true })
          .positional('name', { type: 'string', demandOption: true }),
      async (argv) => {
        await removeRequirementCommand(argv)
      }
    )
    .command(
      'add-scenario <spec> <requirement> <name>',
      'Append a scenario to a requirement of a spec',
      (command) =>
        command
          .positional('spec', { type: 'string', demandOption: true })
          .positional('requirement', { type: 'string', demandOption: true })
          .positional('name', { type: 'string', demandOption: true })
          .option('step', {
            type: 'string',
            array: true,
            describe: 'A step such as "WHEN ..." (repeatable)',
          }),
      async (argv) => {
        await addScenarioCommand(argv)
      }
    )
    .command(
      'archive <change>',
      'Merge the deltas of a change into its specs and archive it',
      (command) =>
        command
          .positional('change', { type: 'string', demandOption: true })
          .option('date-prefix', { type: 'boolean', describe: 'Prefix the archive directory with the date' })
          .option('skip-validation', { type: 'boolean', default: false }),
      async (argv) => {
        if (!(await archiveCommand(argv))) process.exitCode = 1
      }
    )
    .command(
      'accept <change>',
      'Freeze the tasks of a change into tasks.jsonc',
      (command) => command.positional('change', { type: 'string', demandOption: true }),
      async (argv) => {
        await acceptCommand(argv)
      }
    )
    .command(
      'sync <change>',
      'Update tasks.md checkboxes from tasks.jsonc',
      (command) => command.positional('change', { type: 'string', demandOption: true }),
      async (argv) => {
        await syncCommand(argv)
      }
    )
    .command(
      'check <change> <task>',
      'Mark a task of a change as done',
      (command) =>
        command
          .positional('change', { type: 'string', demandOption: true })
          .positional('task', { type: 'string', demandOption: true })
          .option('uncheck', { type: 'boolean', default: false, describe: 'Mark it as not done' }),
      async (argv) => {
        await checkCommand(argv)
      }
    )
    .demandCommand(1)
    .strict()
    .help()
    .fail((message, error) => {
      throw error ?? new Error(message)
    })
}
