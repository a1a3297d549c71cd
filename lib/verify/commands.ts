import { CloudFormationClient } from '@aws-sdk/client-cloudformation';
import { EC2Client } from '@aws-sdk/client-ec2';
import { WebServerError } from '../errors';
import { createLogger } from '../logger';
import { FetchFn, waitForHttpOk } from './http-probe';
import { findOrphans } from './orphans';
import { getStackOutputs, requireOutput } from './stack-outputs';

export interface SmokeArgs {
  readonly stack: string;
  readonly region?: string;
  /** Seconds to wait for the web container */
  readonly timeout: number;
  /** Seconds between attempts */
  readonly interval: number;
}

export interface SmokeDependencies {
  readonly cloudFormation?: CloudFormationClient;
  readonly fetchFn?: FetchFn;
  readonly sleep?: (ms: number) => Promise<unknown>;
  readonly now?: () => number;
}

export interface OrphansArgs {
  readonly envPrefix: string;
  readonly region?: string;
}

export interface OrphansDependencies {
  readonly ec2?: EC2Client;
}

/**
 * Checks that the deployed web container answers on its public URL
 * @returns process exit code
 */
export async function smoke(args: SmokeArgs, deps: SmokeDependencies = {}): Promise<number> {
  const logger = createLogger(['verify', 'smoke', args.stack]);
  const client = deps.cloudFormation ?? new CloudFormationClient({ region: args.region });
  try {
    const outputs = await getStackOutputs(client, args.stack);
    const url = requireOutput(outputs, 'WebUrl', args.stack);
    logger.info(`Polling ${url}`);
    const result = await waitForHttpOk({
      url,
      timeoutMs: args.timeout * 1000,
      intervalMs: args.interval * 1000,
      fetchFn: deps.fetchFn,
      sleep: deps.sleep,
      now: deps.now,
    });
    logger.info(`Web container is up (${result.attempts} attempt(s), ${result.elapsedMs}ms)`);
    return 0;
  } catch (error) {
    if (error instanceof WebServerError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}

/**
 * Checks that nothing tagged for the environment survived a destroy
 * @returns process exit code
 */
export async function orphans(args: OrphansArgs, deps: OrphansDependencies = {}): Promise<number> {
  const logger = createLogger(['verify', 'orphans', args.envPrefix]);
  const client = deps.ec2 ?? new EC2Client({ region: args.region });

  const leftovers = await findOrphans(client, args.envPrefix);
  if (leftovers.length === 0) {
    logger.info(`No resources of environment ${args.envPrefix} remain`);
    return 0;
  }
  for (const orphan of leftovers) {
    logger.error(`${orphan.type} ${orphan.id} (${orphan.name})`);
  }
  logger.error(`${leftovers.length} resource(s) of environment ${args.envPrefix} remain`);
  return 1;
}
