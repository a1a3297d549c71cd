import { Stage, StageProps } from 'aws-cdk-lib';
import { Construct } from 'constructs';
import { WebServerConfig } from '../config';
import { WebServerStack } from '../stacks/webserver.stack';

export interface WebServerStageProps extends StageProps {
  readonly config: WebServerConfig;
}

export class WebServerStage extends Stage {
  readonly stack: WebServerStack;

  constructor(scope: Construct, id: string, props: WebServerStageProps) {
    super(scope, id, props);
    this.stack = new WebServerStack(this, props.config.stackName, {
      config: props.config,
      stackName: props.config.stackName,
    });
  }
}
