import {
  CloudFormationClient,
  CloudFormationServiceException,
  DescribeStacksCommand,
} from '@aws-sdk/client-cloudformation';
import { WEBSERVER_EXCEPTIONS, WebServerError } from '../errors';

/**
 * Reads the outputs of a deployed stack, keyed by output name
 * @param client {@link CloudFormationClient}
 * @param stackName string
 */
export async function getStackOutputs(client: CloudFormationClient, stackName: string): Promise<Record<string, string>> {
  const response = await client
    .send(new DescribeStacksCommand({ StackName: stackName }))
    .catch((error: unknown) => {
      if (error instanceof CloudFormationServiceException && error.message.includes('does not exist')) {
        throw new WebServerError(WEBSERVER_EXCEPTIONS.STACK_NOT_FOUND, `stack ${stackName} does not exist`);
      }
      throw error;
    });

  const stack = response.Stacks?.[0];
  if (!stack) {
    throw new WebServerError(WEBSERVER_EXCEPTIONS.STACK_NOT_FOUND, `stack ${stackName} does not exist`);
  }

  const outputs: Record<string, string> = {};
  for (const output of stack.Outputs ?? []) {
    if (output.OutputKey && output.OutputValue !== undefined) {
      outputs[output.OutputKey] = output.OutputValue;
    }
  }
  return outputs;
}

export function requireOutput(outputs: Record<string, string>, key: string, stackName: string): string {
  const value = outputs[key];
  if (value === undefined) {
    throw new WebServerError(WEBSERVER_EXCEPTIONS.MISSING_OUTPUT, `stack ${stackName} has no ${key} output`);
  }
  return value;
}
