import { Tags } from 'aws-cdk-lib';
import { Construct } from 'constructs';
import {
  IMachineImage,
  ISubnet,
  IVpc,
  Instance,
  InstanceType,
  KeyPair,
  KeyPairType,
  MachineImage,
  Peer,
  Port,
  SecurityGroup,
} from 'aws-cdk-lib/aws-ec2';
import { EntryScript } from '../bootstrap/entry-script';
import { BootstrapConfig, ContainerConfig, MachineImageName } from '../config';
import { nameTag } from '../names';

export interface WebServerModuleProps {
  readonly vpc: IVpc;
  readonly subnet: ISubnet;
  readonly envPrefix: string;
  /** Operator CIDR allowed to reach port 22 */
  readonly myIp: string;
  readonly instanceType: string;
  readonly machineImage: MachineImageName;
  readonly keyPairName: string;
  /**
   * OpenSSH public key to import. A new key pair is generated when omitted.
   */
  readonly publicKey?: string;
  readonly container: ContainerConfig;
  readonly bootstrap: BootstrapConfig;
}

const latestImage = (name: MachineImageName): IMachineImage => {
  switch (name) {
    case 'amazon-linux-2023':
      return MachineImage.latestAmazonLinux2023();
    case 'amazon-linux-2':
      return MachineImage.latestAmazonLinux2();
  }
};

export class WebServerModule extends Construct {
  readonly securityGroup: SecurityGroup;
  readonly keyPair: KeyPair;
  readonly instance: Instance;
  readonly imageId: string;
  readonly entryScript: EntryScript;
  /** SSM parameter holding the private key, only for generated key pairs */
  readonly privateKeyParameterName?: string;

  constructor(scope: Construct, id: string, props: WebServerModuleProps) {
    super(scope, id);

    // Only SSH from the operator and the web port from anywhere are let in
    this.securityGroup = new SecurityGroup(this, 'SecurityGroup', {
      vpc: props.vpc,
      securityGroupName: nameTag(props.envPrefix, 'sg'),
      description: 'SSH from the operator address, HTTP to the web container from anywhere',
      allowAllOutbound: true,
    });
    this.securityGroup.addIngressRule(Peer.ipv4(props.myIp), Port.tcp(22), 'SSH from operator');
    this.securityGroup.addIngressRule(Peer.anyIpv4(), Port.tcp(props.container.hostPort), 'Web container');
    Tags.of(this.securityGroup).add('Name', nameTag(props.envPrefix, 'sg'));

    if (props.publicKey) {
      this.keyPair = new KeyPair(this, 'KeyPair', {
        keyPairName: props.keyPairName,
        publicKeyMaterial: props.publicKey,
      });
    } else {
      this.keyPair = new KeyPair(this, 'KeyPair', {
        keyPairName: props.keyPairName,
        type: KeyPairType.ED25519,
      });
      this.privateKeyParameterName = this.keyPair.privateKey.parameterName;
    }

    const machineImage = latestImage(props.machineImage);
    this.imageId = machineImage.getImage(this).imageId;

    this.entryScript = new EntryScript({ container: props.container, bootstrap: props.bootstrap });

    this.instance = new Instance(this, 'Instance', {
      vpc: props.vpc,
      vpcSubnets: { subnets: [props.subnet] },
      instanceType: new InstanceType(props.instanceType),
      machineImage,
      securityGroup: this.securityGroup,
      keyPair: this.keyPair,
      instanceName: nameTag(props.envPrefix, 'server'),
      userData: this.entryScript.toUserData(),
      // New script content means a new instance, which runs it on first boot
      userDataCausesReplacement: true,
    });
  }
}
