import yargs from 'yargs/yargs';
import { createLogger } from '../logger';
import { OrphansDependencies, SmokeDependencies, orphans, smoke } from './commands';

const logger = createLogger(['verify']);

export type VerifyCliDependencies = SmokeDependencies & OrphansDependencies;

/**
 * Parses verify arguments and runs the selected command
 * @param args arguments without the node binary and script path
 * @param deps clients and hooks handed to the command
 * @returns process exit code
 */
export async function runVerifyCli(args: string[], deps: VerifyCliDependencies = {}): Promise<number> {
  // yargs only parses; the command runs below so that its errors take the same path as usage errors
  const selected: { run?: () => Promise<number> } = {};
  try {
    await yargs(args)
      .scriptName('verify')
      .usage('Usage: $0 <command> [options]')
      .strict()
      .exitProcess(false)
      .option('region', { type: 'string', describe: 'AWS region, defaults to the SDK region chain' })
      .command(
        'smoke',
        'Wait for the deployed web container to answer HTTP 200',
        y =>
          y
            .option('stack', { type: 'string', demandOption: true, describe: 'Deployed stack name' })
            .option('timeout', { type: 'number', default: 300, describe: 'Seconds to wait' })
            .option('interval', { type: 'number', default: 10, describe: 'Seconds between attempts' })
            .check(argv => {
              for (const key of ['timeout', 'interval'] as const) {
                if (!Number.isFinite(argv[key]) || argv[key] <= 0) {
                  throw new Error(`--${key} must be a positive number`);
                }
              }
              return true;
            }),
        argv => {
          selected.run = () =>
            smoke({ stack: argv.stack, region: argv.region, timeout: argv.timeout, interval: argv.interval }, deps);
        },
      )
      .command(
        'orphans',
        'List resources of the environment left behind after destroy',
        y => y.option('env-prefix', { type: 'string', demandOption: true, describe: 'Environment prefix' }),
        argv => {
          selected.run = () => orphans({ envPrefix: argv.envPrefix, region: argv.region }, deps);
        },
      )
      .demandCommand(1, 'a command is required')
      .fail((msg, err, y) => {
        if (err) {
          throw err;
        }
        y.showHelp();
        throw new Error(msg);
      })
      .parseAsync();

    // --help and --version parse without selecting a command
    return selected.run ? await selected.run() : 0;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}
