import { describe, it, expect } from 'vitest';
import { CloudFormationGenerator, isBuiltinKind } from '../cloudformation-generator.js';
import { analyzeTemplate } from '../template-analyzer.js';

describe('CloudFormationGenerator', () => {
  const generator = new CloudFormationGenerator();
  const context = {
    stackNames: {
      network: 'shop-network',
      container: 'shop-container',
      service: 'shop-service',
      pipeline: 'shop-pipeline'
    }
  };

  it('should recognise built-in kinds', () => {
    expect(isBuiltinKind('network')).toBe(true);
    expect(isBuiltinKind('pipeline')).toBe(true);
    expect(isBuiltinKind('database')).toBe(false);
  });

  describe('network', () => {
    const template = generator.generate('network', context);

    it('should place the two public subnets in different availability zones', () => {
      expect(template.Resources.PublicSubnet1.Properties?.AvailabilityZone).toEqual({
        'Fn::Select': [0, { 'Fn::GetAZs': '' }]
      });
      expect(template.Resources.PublicSubnet2.Properties?.AvailabilityZone).toEqual({
        'Fn::Select': [1, { 'Fn::GetAZs': '' }]
      });
    });

    it('should route public traffic only after the gateway is attached', () => {
      expect(template.Resources.PublicRoute.DependsOn).toBe('GatewayAttachment');
      expect(template.Resources.PublicRoute.Properties?.DestinationCidrBlock).toBe('0.0.0.0/0');
    });

    it('should export the VPC and subnets under the stack name', () => {
      const analysis = analyzeTemplate(template, { stackName: 'shop-network', parameters: {} });

      expect(analysis.exports).toEqual(['shop-network-VpcId', 'shop-network-PublicSubnet1', 'shop-network-PublicSubnet2']);
      expect(analysis.imports).toEqual([]);
      expect(analysis.errors).toEqual([]);
    });

    it('should default the CIDR blocks', () => {
      expect(template.Parameters?.VpcCidr.Default).toBe('10.0.0.0/16');
      expect(template.Parameters?.PublicSubnet1Cidr.Default).toBe('10.0.0.0/24');
      expect(template.Parameters?.PublicSubnet2Cidr.Default).toBe('10.0.1.0/24');
    });
  });

  describe('container', () => {
    const template = generator.generate('container', context);

    it('should default the network stack name from the context', () => {
      expect(template.Parameters?.NetworkStackName.Default).toBe('shop-network');
    });

    it('should fall back to the kind when no stage deploys it', () => {
      const standalone = generator.generate('container', { stackNames: {} });

      expect(standalone.Parameters?.NetworkStackName.Default).toBe('network');
    });

    it('should import the network exports and export the cluster and listener', () => {
      const analysis = analyzeTemplate(template, { stackName: 'shop-container', parameters: {} });

      expect(analysis.imports.sort()).toEqual([
        'shop-network-PublicSubnet1',
        'shop-network-PublicSubnet2',
        'shop-network-VpcId'
      ]);
      expect(analysis.exports).toEqual([
        'shop-container-ClusterName',
        'shop-container-ListenerArn',
        'shop-container-LoadBalancerSecurityGroup',
        'shop-container-LoadBalancerUrl'
      ]);
      expect(analysis.errors).toEqual([]);
    });
  });

  describe('service', () => {
    const template = generator.generate('service', context);

    it('should run on Fargate with an execution role', () => {
      expect(template.Resources.TaskDefinition.Properties?.RequiresCompatibilities).toEqual(['FARGATE']);
      expect(template.Resources.TaskExecutionRole.Type).toBe('AWS::IAM::Role');
      expect(template.Resources.Service.DependsOn).toBe('ListenerRule');
    });

    it('should import from both the network and container stacks', () => {
      const analysis = analyzeTemplate(template, { stackName: 'shop-service', parameters: {} });

      expect(analysis.imports.sort()).toEqual([
        'shop-container-ClusterName',
        'shop-container-ListenerArn',
        'shop-container-LoadBalancerSecurityGroup',
        'shop-network-PublicSubnet1',
        'shop-network-PublicSubnet2',
        'shop-network-VpcId'
      ]);
      expect(analysis.exports).toEqual(['shop-service-ServiceName', 'shop-service-ContainerName']);
      expect(analysis.errors).toEqual([]);
    });
  });

  describe('pipeline', () => {
    const template = generator.generate('pipeline', context);

    it('should deploy the image definitions produced by the build', () => {
      const pipelineStages = template.Resources.Pipeline.Properties?.Stages;

      expect(Array.isArray(pipelineStages) && pipelineStages.length).toBe(3);
      expect(JSON.stringify(pipelineStages)).toContain('"FileName":"imagedefinitions.json"');
    });

    it('should keep the repository token out of stack output', () => {
      expect(template.Parameters?.GitHubToken.NoEcho).toBe(true);
    });

    it('should import the cluster and service names', () => {
      const analysis = analyzeTemplate(template, { stackName: 'shop-pipeline', parameters: {} });

      expect(analysis.imports.sort()).toEqual([
        'shop-container-ClusterName',
        'shop-service-ContainerName',
        'shop-service-ServiceName'
      ]);
      expect(analysis.exports).toEqual(['shop-pipeline-RepositoryUri']);
      expect(analysis.errors).toEqual([]);
    });
  });
});
