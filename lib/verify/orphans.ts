import {
  EC2Client,
  Filter,
  Tag,
  paginateDescribeInstances,
  paginateDescribeInternetGateways,
  paginateDescribeRouteTables,
  paginateDescribeSecurityGroups,
  paginateDescribeSubnets,
  paginateDescribeVpcs,
} from '@aws-sdk/client-ec2';
import { declaredNameTags } from '../names';

export type OrphanType = 'vpc' | 'subnet' | 'internet-gateway' | 'route-table' | 'security-group' | 'instance';

export interface Orphan {
  readonly type: OrphanType;
  readonly id: string;
  readonly name: string;
}

const nameOf = (tags: Tag[] | undefined): string => tags?.find(tag => tag.Key === 'Name')?.Value ?? '';

/**
 * Lists resources still carrying one of the environment's `Name` tags, in the
 * order a destroy would have removed them. Names are matched exactly, so an
 * environment whose prefix extends this one is left out.
 * @param client {@link EC2Client}
 * @param envPrefix string
 */
export async function findOrphans(client: EC2Client, envPrefix: string): Promise<Orphan[]> {
  const filters: Filter[] = [{ Name: 'tag:Name', Values: declaredNameTags(envPrefix) }];
  const orphans: Orphan[] = [];

  const instancePages = paginateDescribeInstances(
    { client },
    {
      Filters: [
        ...filters,
        { Name: 'instance-state-name', Values: ['pending', 'running', 'shutting-down', 'stopping', 'stopped'] },
      ],
    },
  );
  for await (const page of instancePages) {
    for (const reservation of page.Reservations ?? []) {
      for (const instance of reservation.Instances ?? []) {
        if (instance.InstanceId) {
          orphans.push({ type: 'instance', id: instance.InstanceId, name: nameOf(instance.Tags) });
        }
      }
    }
  }

  for await (const page of paginateDescribeSecurityGroups({ client }, { Filters: filters })) {
    for (const group of page.SecurityGroups ?? []) {
      if (group.GroupId) {
        orphans.push({ type: 'security-group', id: group.GroupId, name: nameOf(group.Tags) });
      }
    }
  }

  for await (const page of paginateDescribeRouteTables({ client }, { Filters: filters })) {
    for (const routeTable of page.RouteTables ?? []) {
      if (routeTable.RouteTableId) {
        orphans.push({ type: 'route-table', id: routeTable.RouteTableId, name: nameOf(routeTable.Tags) });
      }
    }
  }

  for await (const page of paginateDescribeInternetGateways({ client }, { Filters: filters })) {
    for (const gateway of page.InternetGateways ?? []) {
      if (gateway.InternetGatewayId) {
        orphans.push({ type: 'internet-gateway', id: gateway.InternetGatewayId, name: nameOf(gateway.Tags) });
      }
    }
  }

  for await (const page of paginateDescribeSubnets({ client }, { Filters: filters })) {
    for (const subnet of page.Subnets ?? []) {
      if (subnet.SubnetId) {
        orphans.push({ type: 'subnet', id: subnet.SubnetId, name: nameOf(subnet.Tags) });
      }
    }
  }

  for await (const page of paginateDescribeVpcs({ client }, { Filters: filters })) {
    for (const vpc of page.Vpcs ?? []) {
      if (vpc.VpcId) {
        orphans.push({ type: 'vpc', id: vpc.VpcId, name: nameOf(vpc.Tags) });
      }
    }
  }

  return orphans;
}
