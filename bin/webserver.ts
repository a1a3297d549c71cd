#!/usr/bin/env node
import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import { WebServerConfig } from '../lib/config';
import { createLogger } from '../lib/logger';
import { WebServerStage } from '../lib/stages/webserver.stage';

const logger = createLogger(['app']);

const app = new cdk.App();
const configDir = app.node.tryGetContext('configDir') ?? path.join(__dirname, '../config');
const config = WebServerConfig.load(String(configDir), key => app.node.tryGetContext(key));

const account = config.account ?? process.env['CDK_DEFAULT_ACCOUNT'];
logger.info(`Synthesizing ${config.stackName} for ${account ?? 'current account'} in ${config.region}`);

new WebServerStage(app, config.envPrefix, {
  env: { account, region: config.region },
  config,
});
