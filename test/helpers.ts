import { ContextLookup, WebServerConfig } from '../lib/config';

export const BASE_CONFIG = `
envPrefix: dev
region: eu-central-1
vpcCidrBlock: 10.0.0.0/16
subnetCidrBlock: 10.0.10.0/24
availabilityZone: eu-central-1b
myIp: 203.0.113.10/32
`;

export const TEST_PUBLIC_KEY = 'ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAITestKeyMaterialOnly operator@example.com';

/**
 * Builds a configuration from the base values plus extra YAML lines
 */
export const testConfig = (extra = '', lookup?: ContextLookup): WebServerConfig =>
  WebServerConfig.loadFromString(`${BASE_CONFIG}${extra}`, lookup);
