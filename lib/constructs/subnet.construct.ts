import { Construct, DependencyGroup, IDependable } from 'constructs';
import {
  CfnInternetGateway,
  CfnRoute,
  CfnRouteTable,
  CfnSubnet,
  CfnSubnetRouteTableAssociation,
  CfnVPCGatewayAttachment,
  ISubnet,
  Subnet,
} from 'aws-cdk-lib/aws-ec2';
import { nameTag } from '../names';

export interface SubnetModuleProps {
  readonly vpcId: string;
  readonly envPrefix: string;
  readonly subnetCidrBlock: string;
  readonly availabilityZone: string;
}

/**
 * Public subnet with its own internet gateway and route table.
 */
export class SubnetModule extends Construct {
  readonly subnet: ISubnet;
  readonly internetGatewayId: string;
  readonly routeTableId: string;
  /** Depend on this before anything that needs to reach the internet at boot */
  readonly internetConnectivityEstablished: IDependable;

  constructor(scope: Construct, id: string, props: SubnetModuleProps) {
    super(scope, id);

    const subnet = new CfnSubnet(this, 'Subnet', {
      vpcId: props.vpcId,
      cidrBlock: props.subnetCidrBlock,
      availabilityZone: props.availabilityZone,
      mapPublicIpOnLaunch: true,
      tags: [{ key: 'Name', value: nameTag(props.envPrefix, 'subnet-1') }],
    });

    const internetGateway = new CfnInternetGateway(this, 'InternetGateway', {
      tags: [{ key: 'Name', value: nameTag(props.envPrefix, 'igw') }],
    });
    const attachment = new CfnVPCGatewayAttachment(this, 'AttachGateway', {
      vpcId: props.vpcId,
      internetGatewayId: internetGateway.ref,
    });

    const routeTable = new CfnRouteTable(this, 'RouteTable', {
      vpcId: props.vpcId,
      tags: [{ key: 'Name', value: nameTag(props.envPrefix, 'rtb') }],
    });
    // The route can only be created once the gateway is attached to the VPC
    const publicRoute = new CfnRoute(this, 'PublicRoute', {
      routeTableId: routeTable.ref,
      destinationCidrBlock: '0.0.0.0/0',
      gatewayId: internetGateway.ref,
    });
    publicRoute.addDependency(attachment);

    const association = new CfnSubnetRouteTableAssociation(this, 'SubnetRouteTableAssociation', {
      subnetId: subnet.ref,
      routeTableId: routeTable.ref,
    });

    const connectivity = new DependencyGroup();
    connectivity.add(publicRoute, association);
    this.internetConnectivityEstablished = connectivity;

    this.internetGatewayId = internetGateway.ref;
    this.routeTableId = routeTable.ref;
    this.subnet = Subnet.fromSubnetAttributes(this, 'ImportedSubnet', {
      subnetId: subnet.ref,
      availabilityZone: props.availabilityZone,
      routeTableId: routeTable.ref,
      ipv4CidrBlock: props.subnetCidrBlock,
    });
  }
}
