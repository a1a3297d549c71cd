import * as path from 'path';
import { describe, expect, test } from 'vitest';
import { WebServerConfig } from '../lib/config';
import { BASE_CONFIG, testConfig } from './helpers';

const testNamePrefix = 'Config(WebServerConfig): ';

describe('WebServerConfig', () => {
  test(`${testNamePrefix} loads the bundled values file`, () => {
    const config = WebServerConfig.load(path.join(__dirname, '../config'));

    expect(config.envPrefix).toBe('dev');
    expect(config.region).toBe('eu-central-1');
    expect(config.vpcCidrBlock).toBe('10.0.0.0/16');
    expect(config.subnetCidrBlock).toBe('10.0.10.0/24');
    expect(config.availabilityZone).toBe('eu-central-1b');
    expect(config.myIp).toBe('203.0.113.10/32');
    expect(config.instanceType).toBe('t2.micro');
    expect(config.machineImage).toBe('amazon-linux-2');
    expect(config.keyPairName).toBe('server-key');
    expect(config.publicKey).toBeUndefined();
    expect(config.container).toEqual({ image: 'nginx', hostPort: 8080, containerPort: 80 });
    expect(config.bootstrap).toEqual({ osUser: 'ec2-user' });
    expect(config.stackName).toBe('dev-webserver');
  });

  test(`${testNamePrefix} applies defaults for optional keys`, () => {
    const config = testConfig();

    expect(config.account).toBeUndefined();
    expect(config.instanceType).toBe('t2.micro');
    expect(config.machineImage).toBe('amazon-linux-2');
    expect(config.keyPairName).toBe('server-key');
    expect(config.container).toEqual({ image: 'nginx', hostPort: 8080, containerPort: 80 });
    expect(config.bootstrap).toEqual({ osUser: 'ec2-user' });
  });

  test(`${testNamePrefix} keeps partial nested values and fills the rest`, () => {
    const config = testConfig('container:\n  image: httpd\n');

    expect(config.container).toEqual({ image: 'httpd', hostPort: 8080, containerPort: 80 });
  });

  test(`${testNamePrefix} widens a bare operator address to /32`, () => {
    const config = WebServerConfig.loadFromString(BASE_CONFIG.replace('203.0.113.10/32', '198.51.100.7'));

    expect(config.myIp).toBe('198.51.100.7/32');
  });

  test(`${testNamePrefix} applies string context overrides`, () => {
    const context: Record<string, unknown> = { myIp: '198.51.100.0/24', instanceType: 't3.small', envPrefix: 42 };
    const config = testConfig('', key => context[key]);

    expect(config.myIp).toBe('198.51.100.0/24');
    expect(config.instanceType).toBe('t3.small');
    expect(config.envPrefix).toBe('dev');
  });

  test(`${testNamePrefix} validates context overrides like file values`, () => {
    expect(() => testConfig('', key => (key === 'machineImage' ? 'ubuntu' : undefined))).toThrow(
      'InvalidConfigurationException: /machineImage must be equal to one of the allowed values',
    );
  });

  test(`${testNamePrefix} rejects a missing required key`, () => {
    expect(() => WebServerConfig.loadFromString(BASE_CONFIG.replace('myIp: 203.0.113.10/32', ''))).toThrow(
      "InvalidConfigurationException: / must have required property 'myIp'",
    );
  });

  test(`${testNamePrefix} rejects an out of range port`, () => {
    expect(() => testConfig('container:\n  hostPort: 70000\n')).toThrow(
      'InvalidConfigurationException: /container/hostPort must be <= 65535',
    );
  });

  test(`${testNamePrefix} rejects a document that is not a mapping`, () => {
    expect(() => WebServerConfig.loadFromString('- dev\n- prod\n')).toThrow(
      'InvalidConfigurationException: configuration must be a mapping',
    );
  });

  test(`${testNamePrefix} rejects a subnet outside the VPC`, () => {
    expect(() => WebServerConfig.loadFromString(BASE_CONFIG.replace('10.0.10.0/24', '10.1.0.0/24'))).toThrow(
      'InvalidConfigurationException: subnetCidrBlock 10.1.0.0/24 is outside vpcCidrBlock 10.0.0.0/16',
    );
  });

  test(`${testNamePrefix} rejects a subnet range that does not start on its boundary`, () => {
    expect(() => WebServerConfig.loadFromString(BASE_CONFIG.replace('10.0.10.0/24', '10.0.10.5/24'))).toThrow(
      'InvalidConfigurationException: subnetCidrBlock 10.0.10.5/24 is not a valid IPv4 CIDR range',
    );
  });

  test(`${testNamePrefix} rejects an availability zone from another region`, () => {
    expect(() => WebServerConfig.loadFromString(BASE_CONFIG.replace('eu-central-1b', 'us-east-1a'))).toThrow(
      'InvalidConfigurationException: availabilityZone us-east-1a is not in region eu-central-1',
    );
  });

  test(`${testNamePrefix} rejects an operator address that is not IPv4`, () => {
    expect(() => WebServerConfig.loadFromString(BASE_CONFIG.replace('203.0.113.10/32', 'operator'))).toThrow(
      'InvalidConfigurationException: myIp operator is not an IPv4 address or CIDR',
    );
  });
});
