import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { BootstrapConfig, ContainerConfig } from '../config';

export interface EntryScriptProps {
  readonly container: ContainerConfig;
  readonly bootstrap: BootstrapConfig;
}

/**
 * Boot routine run once by the web server instance: installs the container
 * runtime, lets the OS user drive it and starts the web container.
 *
 * Steps run in order under `set -e`, so the first failure stops the rest.
 * Nothing is retried and nothing reports back to CloudFormation; a failed boot
 * leaves the instance running with the port closed.
 *
 * A second run on the same host does not remove the running container, the
 * final `docker run` fails on the already bound host port.
 */
export class EntryScript {
  static readonly SHEBANG = '#!/bin/bash';

  /** The five provisioning commands, in execution order */
  readonly steps: readonly string[];

  constructor(props: EntryScriptProps) {
    const { image, hostPort, containerPort } = props.container;
    this.steps = [
      'sudo yum update -y',
      'sudo yum install -y docker',
      `sudo usermod -aG docker ${props.bootstrap.osUser}`,
      'sudo systemctl start docker',
      // group membership only applies to new logins, so this one still needs sudo
      `sudo docker run -d -p ${hostPort}:${containerPort} ${image}`,
    ];
  }

  /**
   * Script body without the shebang
   */
  get lines(): string[] {
    return ['set -e', ...this.steps];
  }

  render(): string {
    return [EntryScript.SHEBANG, ...this.lines].join('\n');
  }

  toUserData(): ec2.UserData {
    const userData = ec2.UserData.forLinux({ shebang: EntryScript.SHEBANG });
    userData.addCommands(...this.lines);
    return userData;
  }
}
