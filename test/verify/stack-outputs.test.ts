import { beforeEach, describe, expect, test } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  CloudFormationClient,
  CloudFormationServiceException,
  DescribeStacksCommand,
  StackStatus,
} from '@aws-sdk/client-cloudformation';
import { getStackOutputs, requireOutput } from '../../lib/verify/stack-outputs';

const cloudFormationMockClient = mockClient(CloudFormationClient);
const client = new CloudFormationClient({ region: 'eu-central-1' });

describe('getStackOutputs', () => {
  beforeEach(() => {
    cloudFormationMockClient.reset();
  });

  test('should return outputs keyed by name', async () => {
    cloudFormationMockClient.on(DescribeStacksCommand).resolves({
      Stacks: [
        {
          StackName: 'dev-webserver',
          CreationTime: new Date('2026-01-01T00:00:00Z'),
          StackStatus: StackStatus.CREATE_COMPLETE,
          Outputs: [
            { OutputKey: 'WebUrl', OutputValue: 'http://198.51.100.7:8080' },
            { OutputKey: 'InstanceId', OutputValue: 'i-0123456789abcdef0' },
            { OutputKey: 'Dangling' },
          ],
        },
      ],
    });

    const outputs = await getStackOutputs(client, 'dev-webserver');

    expect(outputs).toEqual({ WebUrl: 'http://198.51.100.7:8080', InstanceId: 'i-0123456789abcdef0' });
    expect(cloudFormationMockClient.commandCalls(DescribeStacksCommand)[0].args[0].input).toEqual({
      StackName: 'dev-webserver',
    });
  });

  test('should map a missing stack to StackNotFoundException', async () => {
    cloudFormationMockClient.on(DescribeStacksCommand).rejects(
      new CloudFormationServiceException({
        name: 'ValidationError',
        message: 'Stack with id dev-webserver does not exist',
        $fault: 'client',
        $metadata: {},
      }),
    );

    await expect(getStackOutputs(client, 'dev-webserver')).rejects.toThrow(
      'StackNotFoundException: stack dev-webserver does not exist',
    );
  });

  test('should treat an empty stack list as a missing stack', async () => {
    cloudFormationMockClient.on(DescribeStacksCommand).resolves({ Stacks: [] });

    await expect(getStackOutputs(client, 'dev-webserver')).rejects.toThrow(
      'StackNotFoundException: stack dev-webserver does not exist',
    );
  });

  test('should pass other service errors through', async () => {
    cloudFormationMockClient.on(DescribeStacksCommand).rejects(
      new CloudFormationServiceException({
        name: 'AccessDenied',
        message: 'User is not authorized to perform cloudformation:DescribeStacks',
        $fault: 'client',
        $metadata: {},
      }),
    );

    await expect(getStackOutputs(client, 'dev-webserver')).rejects.toThrow(
      'User is not authorized to perform cloudformation:DescribeStacks',
    );
  });
});

describe('requireOutput', () => {
  test('should return the value when present', () => {
    expect(requireOutput({ WebUrl: 'http://198.51.100.7:8080' }, 'WebUrl', 'dev-webserver')).toBe(
      'http://198.51.100.7:8080',
    );
  });

  test('should throw MissingOutputException when absent', () => {
    expect(() => requireOutput({}, 'WebUrl', 'dev-webserver')).toThrow(
      'MissingOutputException: stack dev-webserver has no WebUrl output',
    );
  });
});
