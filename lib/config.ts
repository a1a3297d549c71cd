import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import Ajv from 'ajv';
import { IPv4CidrRange, Validator } from 'ip-num';
import configSchema from '../config/webserver-config.schema.json';
import { WEBSERVER_EXCEPTIONS, WebServerError } from './errors';
import { createLogger } from './logger';

const logger = createLogger(['config']);

const ajv = new Ajv({ allErrors: true });

export type MachineImageName = 'amazon-linux-2' | 'amazon-linux-2023';

export interface ContainerConfig {
  /** Public image the bootstrap script runs */
  readonly image: string;
  readonly hostPort: number;
  readonly containerPort: number;
}

export interface BootstrapConfig {
  /** Unprivileged OS user granted access to the container runtime */
  readonly osUser: string;
}

/**
 * Shape of config/webserver-config.yaml before defaults are applied.
 */
export interface WebServerConfigFile {
  envPrefix: string;
  account?: string;
  region: string;
  vpcCidrBlock: string;
  subnetCidrBlock: string;
  availabilityZone: string;
  myIp: string;
  instanceType?: string;
  machineImage?: MachineImageName;
  keyPairName?: string;
  publicKey?: string;
  container?: Partial<ContainerConfig>;
  bootstrap?: Partial<BootstrapConfig>;
}

/**
 * Looks up a single override, typically `app.node.tryGetContext`.
 */
export type ContextLookup = (key: string) => unknown;

const validateFile = ajv.compile<WebServerConfigFile>(configSchema);

/**
 * Top-level keys that may be overridden with `cdk -c key=value`.
 */
export const OVERRIDABLE_KEYS = [
  'envPrefix',
  'account',
  'region',
  'vpcCidrBlock',
  'subnetCidrBlock',
  'availabilityZone',
  'myIp',
  'instanceType',
  'machineImage',
  'keyPairName',
  'publicKey',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class WebServerConfig {
  static readonly FILENAME = 'webserver-config.yaml';

  readonly envPrefix: string;
  readonly account: string | undefined;
  readonly region: string;
  readonly vpcCidrBlock: string;
  readonly subnetCidrBlock: string;
  readonly availabilityZone: string;
  /**
   * Operator address in CIDR notation, a bare address is widened to /32
   */
  readonly myIp: string;
  readonly instanceType: string;
  readonly machineImage: MachineImageName;
  readonly keyPairName: string;
  readonly publicKey: string | undefined;
  readonly container: ContainerConfig;
  readonly bootstrap: BootstrapConfig;

  private constructor(values: WebServerConfigFile) {
    this.envPrefix = values.envPrefix;
    this.account = values.account;
    this.region = values.region;
    this.vpcCidrBlock = values.vpcCidrBlock;
    this.subnetCidrBlock = values.subnetCidrBlock;
    this.availabilityZone = values.availabilityZone;
    this.myIp = values.myIp.includes('/') ? values.myIp : `${values.myIp}/32`;
    this.instanceType = values.instanceType ?? 't2.micro';
    this.machineImage = values.machineImage ?? 'amazon-linux-2';
    this.keyPairName = values.keyPairName ?? 'server-key';
    this.publicKey = values.publicKey;
    this.container = {
      image: values.container?.image ?? 'nginx',
      hostPort: values.container?.hostPort ?? 8080,
      containerPort: values.container?.containerPort ?? 80,
    };
    this.bootstrap = {
      osUser: values.bootstrap?.osUser ?? 'ec2-user',
    };
  }

  /**
   * Stack name derived from the environment prefix
   */
  get stackName(): string {
    return `${this.envPrefix}-webserver`;
  }

  /**
   * Loads the configuration file from the given directory
   * @param dir directory holding webserver-config.yaml
   * @param lookup optional context lookup used for overrides
   */
  static load(dir: string, lookup?: ContextLookup): WebServerConfig {
    const filePath = path.join(dir, WebServerConfig.FILENAME);
    logger.info(`Loading configuration from ${filePath}`);
    return WebServerConfig.loadFromString(fs.readFileSync(filePath, 'utf8'), lookup);
  }

  static loadFromString(content: string, lookup?: ContextLookup): WebServerConfig {
    const loaded: unknown = yaml.load(content);
    if (!isRecord(loaded)) {
      throw new WebServerError(WEBSERVER_EXCEPTIONS.INVALID_CONFIGURATION, 'configuration must be a mapping');
    }

    const values: Record<string, unknown> = { ...loaded };
    if (lookup) {
      for (const key of OVERRIDABLE_KEYS) {
        const override = lookup(key);
        if (typeof override === 'string') {
          logger.info(`Overriding ${key} from context`);
          values[key] = override;
        }
      }
    }

    if (!validateFile(values)) {
      const errors = (validateFile.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
      throw new WebServerError(WEBSERVER_EXCEPTIONS.INVALID_CONFIGURATION, errors.join('; '));
    }

    const problems = WebServerConfig.checkNetwork(values);
    if (problems.length > 0) {
      throw new WebServerError(WEBSERVER_EXCEPTIONS.INVALID_CONFIGURATION, problems.join('; '));
    }

    return new WebServerConfig(values);
  }

  private static checkNetwork(values: WebServerConfigFile): string[] {
    const problems: string[] = [];

    const vpcCidr = WebServerConfig.parseRange(values.vpcCidrBlock);
    const subnetCidr = WebServerConfig.parseRange(values.subnetCidrBlock);
    if (!vpcCidr) {
      problems.push(`vpcCidrBlock ${values.vpcCidrBlock} is not a valid IPv4 CIDR range`);
    }
    if (!subnetCidr) {
      problems.push(`subnetCidrBlock ${values.subnetCidrBlock} is not a valid IPv4 CIDR range`);
    }
    if (vpcCidr && subnetCidr && !(subnetCidr.inside(vpcCidr) || subnetCidr.isEquals(vpcCidr))) {
      problems.push(`subnetCidrBlock ${values.subnetCidrBlock} is outside vpcCidrBlock ${values.vpcCidrBlock}`);
    }

    const ipValid = values.myIp.includes('/')
      ? Validator.isValidIPv4CidrNotation(values.myIp)[0]
      : Validator.isValidIPv4String(values.myIp)[0];
    if (!ipValid) {
      problems.push(`myIp ${values.myIp} is not an IPv4 address or CIDR`);
    }

    if (!values.availabilityZone.startsWith(values.region)) {
      problems.push(`availabilityZone ${values.availabilityZone} is not in region ${values.region}`);
    }

    return problems;
  }

  private static parseRange(cidr: string): IPv4CidrRange | undefined {
    if (!Validator.isValidIPv4CidrRange(cidr)[0]) {
      return undefined;
    }
    return IPv4CidrRange.fromCidr(cidr);
  }
}
