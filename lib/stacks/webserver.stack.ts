import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import { CfnVPC, Vpc } from 'aws-cdk-lib/aws-ec2';
import { WebServerConfig } from '../config';
import { nameTag } from '../names';
import { SubnetModule } from '../constructs/subnet.construct';
import { WebServerModule } from '../constructs/webserver.construct';

export interface WebServerStackProps extends cdk.StackProps {
  readonly config: WebServerConfig;
}

export class WebServerStack extends cdk.Stack {
  readonly subnetModule: SubnetModule;
  readonly webServer: WebServerModule;

  constructor(scope: Construct, id: string, props: WebServerStackProps) {
    super(scope, id, props);
    const { config } = props;

    // Isolated network for the web server
    const vpc = new CfnVPC(this, 'Vpc', {
      cidrBlock: config.vpcCidrBlock,
      enableDnsSupport: true,
      enableDnsHostnames: true,
      tags: [{ key: 'Name', value: nameTag(config.envPrefix, 'vpc') }],
    });

    this.subnetModule = new SubnetModule(this, 'SubnetModule', {
      vpcId: vpc.ref,
      envPrefix: config.envPrefix,
      subnetCidrBlock: config.subnetCidrBlock,
      availabilityZone: config.availabilityZone,
    });

    // L2 view of the network above, for the constructs that need an IVpc
    const vpcView = Vpc.fromVpcAttributes(this, 'VpcView', {
      vpcId: vpc.ref,
      vpcCidrBlock: config.vpcCidrBlock,
      availabilityZones: [config.availabilityZone],
      publicSubnetIds: [this.subnetModule.subnet.subnetId],
      publicSubnetRouteTableIds: [this.subnetModule.routeTableId],
    });

    this.webServer = new WebServerModule(this, 'WebServerModule', {
      vpc: vpcView,
      subnet: this.subnetModule.subnet,
      envPrefix: config.envPrefix,
      myIp: config.myIp,
      instanceType: config.instanceType,
      machineImage: config.machineImage,
      keyPairName: config.keyPairName,
      publicKey: config.publicKey,
      container: config.container,
      bootstrap: config.bootstrap,
    });
    // The boot script pulls packages and the image, so the route must exist first
    this.webServer.instance.node.addDependency(this.subnetModule.internetConnectivityEstablished);

    new cdk.CfnOutput(this, 'VpcId', { value: vpc.ref, description: 'VPC ID' });
    new cdk.CfnOutput(this, 'SubnetId', { value: this.subnetModule.subnet.subnetId, description: 'Public subnet ID' });
    new cdk.CfnOutput(this, 'SecurityGroupId', {
      value: this.webServer.securityGroup.securityGroupId,
      description: 'Web server security group ID',
    });
    new cdk.CfnOutput(this, 'InstanceId', { value: this.webServer.instance.instanceId, description: 'EC2 instance ID' });
    new cdk.CfnOutput(this, 'InstancePublicIp', {
      value: this.webServer.instance.instancePublicIp,
      description: 'Public IP of the web server',
    });
    new cdk.CfnOutput(this, 'AmiId', { value: this.webServer.imageId, description: 'AMI the instance was launched from' });
    new cdk.CfnOutput(this, 'WebUrl', {
      value: `http://${this.webServer.instance.instancePublicIp}:${config.container.hostPort}`,
      description: 'Web container URL',
    });
    new cdk.CfnOutput(this, 'KeyPairName', { value: this.webServer.keyPair.keyPairName, description: 'SSH key pair name' });
    if (this.webServer.privateKeyParameterName) {
      new cdk.CfnOutput(this, 'PrivateKeyParameter', {
        value: this.webServer.privateKeyParameterName,
        description: 'SSM parameter holding the generated private key',
      });
    }
  }
}
