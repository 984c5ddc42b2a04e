import { describe, it, expect } from 'vitest';
import {
  analyzeResources,
  analyzeTemplate,
  collectReferences,
  effectiveParameters,
  evaluateName,
  toTemplateDocument
} from '../template-analyzer.js';
import { CloudFormationTemplate } from '../types.js';
import { StackctlError } from '../../errors/index.js';

const template = (resources: CloudFormationTemplate['Resources'], extra: Partial<CloudFormationTemplate> = {}): CloudFormationTemplate => ({
  AWSTemplateFormatVersion: '2010-09-09',
  Resources: resources,
  ...extra
});

describe('evaluateName', () => {
  const variables = { 'AWS::StackName': 'shop-network', Env: 'prod', Missing: undefined };

  it('should return plain strings as they are', () => {
    expect(evaluateName('shared-VpcId', variables)).toBe('shared-VpcId');
  });

  it('should resolve Ref against the variables', () => {
    expect(evaluateName({ Ref: 'Env' }, variables)).toBe('prod');
    expect(evaluateName({ Ref: 'Missing' }, variables)).toBeUndefined();
  });

  it('should substitute Fn::Sub placeholders', () => {
    expect(evaluateName({ 'Fn::Sub': '${AWS::StackName}-VpcId' }, variables)).toBe('shop-network-VpcId');
  });

  it('should use the local variables of the list form of Fn::Sub', () => {
    const expression = { 'Fn::Sub': ['${Prefix}-${Env}', { Prefix: { Ref: 'AWS::StackName' } }] };

    expect(evaluateName(expression, variables)).toBe('shop-network-prod');
  });

  it('should keep escaped placeholders literal', () => {
    expect(evaluateName({ 'Fn::Sub': '${!Literal}-${Env}' }, variables)).toBe('${Literal}-prod');
  });

  it('should join evaluated parts', () => {
    expect(evaluateName({ 'Fn::Join': ['-', [{ Ref: 'AWS::StackName' }, 'SubnetIds']] }, variables)).toBe(
      'shop-network-SubnetIds'
    );
  });

  it('should give up on anything only known at deploy time', () => {
    expect(evaluateName({ 'Fn::Sub': '${Unknown}-VpcId' }, variables)).toBeUndefined();
    expect(evaluateName({ 'Fn::GetAtt': ['Vpc', 'CidrBlock'] }, variables)).toBeUndefined();
    expect(evaluateName({ 'Fn::Join': ['-', [{ Ref: 'Missing' }, 'x']] }, variables)).toBeUndefined();
  });
});

describe('collectReferences', () => {
  it('should find Ref, GetAtt and Sub references', () => {
    const found = collectReferences({
      VpcId: { Ref: 'Vpc' },
      Arn: { 'Fn::GetAtt': ['Role', 'Arn'] },
      Name: { 'Fn::GetAtt': 'Bucket.Arn' },
      Path: { 'Fn::Sub': '${Bucket.Arn}/${Env}/*' }
    });

    expect([...found].sort()).toEqual(['Bucket', 'Env', 'Role', 'Vpc']);
  });

  it('should not report local variables of Fn::Sub', () => {
    const found = collectReferences({ 'Fn::Sub': ['${Name}-logs', { Name: { Ref: 'ServiceName' } }] });

    expect([...found]).toEqual(['ServiceName']);
  });
});

describe('effectiveParameters', () => {
  it('should prefer overrides over defaults', () => {
    const document = template(
      { Vpc: { Type: 'AWS::EC2::VPC' } },
      {
        Parameters: {
          VpcCidr: { Type: 'String', Default: '10.0.0.0/16' },
          Count: { Type: 'Number', Default: 2 },
          Token: { Type: 'String' }
        }
      }
    );

    expect(effectiveParameters(document, { VpcCidr: '10.8.0.0/16' })).toEqual({
      VpcCidr: '10.8.0.0/16',
      Count: '2',
      Token: undefined
    });
  });
});

describe('analyzeResources', () => {
  it('should combine explicit and implicit dependencies', () => {
    const { resources, errors } = analyzeResources(template({
      Vpc: { Type: 'AWS::EC2::VPC' },
      Gateway: { Type: 'AWS::EC2::InternetGateway' },
      Attachment: {
        Type: 'AWS::EC2::VPCGatewayAttachment',
        Properties: { VpcId: { Ref: 'Vpc' }, InternetGatewayId: { Ref: 'Gateway' } }
      },
      Route: { Type: 'AWS::EC2::Route', DependsOn: 'Attachment', Properties: { GatewayId: { Ref: 'Gateway' } } }
    }));

    expect(errors).toEqual([]);
    expect(resources.map(resource => [resource.logicalId, resource.dependsOn])).toEqual([
      ['Vpc', []],
      ['Gateway', []],
      ['Attachment', ['Vpc', 'Gateway']],
      ['Route', ['Attachment', 'Gateway']]
    ]);
  });

  it('should accept parameters and pseudo parameters', () => {
    const { errors } = analyzeResources(template(
      { Vpc: { Type: 'AWS::EC2::VPC', Properties: { CidrBlock: { Ref: 'VpcCidr' }, Tags: [{ Key: 'Region', Value: { Ref: 'AWS::Region' } }] } } },
      { Parameters: { VpcCidr: { Type: 'String' } } }
    ));

    expect(errors).toEqual([]);
  });

  it('should report references to unknown names', () => {
    const { errors } = analyzeResources(template({
      Subnet: { Type: 'AWS::EC2::Subnet', DependsOn: 'Gateway', Properties: { VpcId: { Ref: 'MainVpc' } } }
    }));

    expect(errors).toEqual([
      'Resource Subnet depends on unknown resource Gateway',
      'Resource Subnet references unknown name MainVpc'
    ]);
  });

  it('should report a resource referencing itself', () => {
    const { errors } = analyzeResources(template({
      Group: { Type: 'AWS::EC2::SecurityGroup', Properties: { SourceSecurityGroupId: { Ref: 'Group' } } }
    }));

    expect(errors).toEqual(['Resource Group references itself']);
  });

  it('should report cycles between resources', () => {
    const { errors } = analyzeResources(template({
      A: { Type: 'AWS::SNS::Topic', Properties: { Name: { 'Fn::GetAtt': ['B', 'TopicName'] } } },
      B: { Type: 'AWS::SNS::Topic', DependsOn: 'A' }
    }));

    expect(errors).toEqual(['Circular dependency between resources: A -> B -> A']);
  });
});

describe('analyzeTemplate', () => {
  it('should warn about export and import names it cannot evaluate', () => {
    const document = template(
      { Topic: { Type: 'AWS::SNS::Topic', Properties: { Name: { 'Fn::ImportValue': { 'Fn::GetAtt': ['X', 'Y'] } } } } },
      { Outputs: { TopicArn: { Value: { Ref: 'Topic' }, Export: { Name: { 'Fn::GetAtt': ['Topic', 'TopicName'] } } } } }
    );

    const analysis = analyzeTemplate(document, { stackName: 'events', parameters: {} });

    expect(analysis.exports).toEqual([]);
    expect(analysis.imports).toEqual([]);
    expect(analysis.warnings).toEqual([
      'Export name of output TopicArn cannot be evaluated before deployment',
      'Import {"Fn::GetAtt":["X","Y"]} cannot be evaluated before deployment'
    ]);
  });

  it('should evaluate names with parameter overrides and the region', () => {
    const document = template(
      { Topic: { Type: 'AWS::SNS::Topic', Properties: { Name: { 'Fn::ImportValue': { 'Fn::Sub': '${Upstream}-Name' } } } } },
      {
        Parameters: { Upstream: { Type: 'String', Default: 'upstream' } },
        Outputs: { TopicArn: { Value: { Ref: 'Topic' }, Export: { Name: { 'Fn::Sub': '${AWS::Region}-${AWS::StackName}-Topic' } } } }
      }
    );

    const analysis = analyzeTemplate(document, { stackName: 'events', region: 'eu-west-1', parameters: { Upstream: 'orders' } });

    expect(analysis.imports).toEqual(['orders-Name']);
    expect(analysis.exports).toEqual(['eu-west-1-events-Topic']);
    expect(analysis.parameters).toEqual({ Upstream: 'orders' });
  });
});

describe('toTemplateDocument', () => {
  it('should reject a template without resources', () => {
    expect(() => toTemplateDocument({ Resources: {} }, 'empty.yml')).toThrow(
      'Template empty.yml is invalid: Template must contain at least one resource'
    );
  });

  it('should reject a resource without a type', () => {
    expect(() => toTemplateDocument({ Resources: { Vpc: { Properties: {} } } }, 'vpc.yml')).toThrow(StackctlError);
    expect(() => toTemplateDocument({ Resources: { Vpc: { Properties: {} } } }, 'vpc.yml')).toThrow(
      'Template vpc.yml is invalid: Resource Vpc missing Type property'
    );
  });

  it('should reject a malformed DependsOn', () => {
    expect(() => toTemplateDocument({ Resources: { Vpc: { Type: 'AWS::EC2::VPC', DependsOn: [1] } } }, 'vpc.yml')).toThrow(
      'Template vpc.yml is invalid: Resource Vpc has a malformed DependsOn'
    );
  });

  it('should default the format version and keep parameters', () => {
    const document = toTemplateDocument({
      Parameters: { VpcCidr: { Type: 'String', Default: '10.0.0.0/16' } },
      Resources: { Vpc: { Type: 'AWS::EC2::VPC' } }
    }, 'vpc.yml');

    expect(document.AWSTemplateFormatVersion).toBe('2010-09-09');
    expect(document.Parameters?.VpcCidr.Default).toBe('10.0.0.0/16');
  });
});
