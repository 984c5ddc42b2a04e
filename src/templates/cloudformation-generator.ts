import { CloudFormationTemplate, GeneratorContext, TemplateGenerator, TemplateOutput } from './types.js';
import { BuiltinTemplateKind } from '../types/index.js';

export const BUILTIN_KINDS: BuiltinTemplateKind[] = ['network', 'container', 'service', 'pipeline'];

export function isBuiltinKind(value: string): value is BuiltinTemplateKind {
  return BUILTIN_KINDS.some(kind => kind === value);
}

const importValue = (stackParameter: string, exportSuffix: string) => ({
  'Fn::ImportValue': { 'Fn::Sub': `\${${stackParameter}}-${exportSuffix}` }
});

const exportedOutput = (description: string, value: unknown, exportSuffix: string): TemplateOutput => ({
  Description: description,
  Value: value,
  Export: { Name: { 'Fn::Sub': `\${AWS::StackName}-${exportSuffix}` } }
});

const stackNameParameter = (kind: BuiltinTemplateKind, context: GeneratorContext) => ({
  Type: 'String',
  Default: context.stackNames[kind] ?? kind,
  Description: `Name of the ${kind} stack whose exports this stack imports`
});

/**
 * Generates the four stacks of a Fargate application: network, container
 * cluster, ECS service and CI/CD pipeline. Later stacks read the earlier
 * stacks' exports through <Kind>StackName parameters.
 */
export class CloudFormationGenerator implements TemplateGenerator {
  generate(kind: BuiltinTemplateKind, context: GeneratorContext): CloudFormationTemplate {
    switch (kind) {
      case 'network':
        return this.createNetworkTemplate();
      case 'container':
        return this.createContainerTemplate(context);
      case 'service':
        return this.createServiceTemplate(context);
      case 'pipeline':
        return this.createPipelineTemplate(context);
    }
  }

  private createNetworkTemplate(): CloudFormationTemplate {
    const publicSubnet = (index: number) => ({
      Type: 'AWS::EC2::Subnet',
      Properties: {
        VpcId: { Ref: 'VPC' },
        CidrBlock: { Ref: `PublicSubnet${index + 1}Cidr` },
        AvailabilityZone: { 'Fn::Select': [index, { 'Fn::GetAZs': '' }] },
        MapPublicIpOnLaunch: true
      }
    });

    return {
      AWSTemplateFormatVersion: '2010-09-09',
      Description: 'VPC with two public subnets in separate availability zones',
      Parameters: {
        VpcCidr: { Type: 'String', Default: '10.0.0.0/16', Description: 'CIDR block of the VPC' },
        PublicSubnet1Cidr: { Type: 'String', Default: '10.0.0.0/24', Description: 'CIDR block of the first public subnet' },
        PublicSubnet2Cidr: { Type: 'String', Default: '10.0.1.0/24', Description: 'CIDR block of the second public subnet' }
      },
      Resources: {
        VPC: {
          Type: 'AWS::EC2::VPC',
          Properties: {
            CidrBlock: { Ref: 'VpcCidr' },
            EnableDnsSupport: true,
            EnableDnsHostnames: true
          }
        },
        InternetGateway: { Type: 'AWS::EC2::InternetGateway' },
        GatewayAttachment: {
          Type: 'AWS::EC2::VPCGatewayAttachment',
          Properties: {
            VpcId: { Ref: 'VPC' },
            InternetGatewayId: { Ref: 'InternetGateway' }
          }
        },
        PublicSubnet1: publicSubnet(0),
        PublicSubnet2: publicSubnet(1),
        PublicRouteTable: {
          Type: 'AWS::EC2::RouteTable',
          Properties: { VpcId: { Ref: 'VPC' } }
        },
        PublicRoute: {
          Type: 'AWS::EC2::Route',
          DependsOn: 'GatewayAttachment',
          Properties: {
            RouteTableId: { Ref: 'PublicRouteTable' },
            DestinationCidrBlock: '0.0.0.0/0',
            GatewayId: { Ref: 'InternetGateway' }
          }
        },
        PublicSubnet1RouteTableAssociation: {
          Type: 'AWS::EC2::SubnetRouteTableAssociation',
          Properties: {
            SubnetId: { Ref: 'PublicSubnet1' },
            RouteTableId: { Ref: 'PublicRouteTable' }
          }
        },
        PublicSubnet2RouteTableAssociation: {
          Type: 'AWS::EC2::SubnetRouteTableAssociation',
          Properties: {
            SubnetId: { Ref: 'PublicSubnet2' },
            RouteTableId: { Ref: 'PublicRouteTable' }
          }
        }
      },
      Outputs: {
        VpcId: exportedOutput('VPC identifier', { Ref: 'VPC' }, 'VpcId'),
        PublicSubnet1: exportedOutput('First public subnet', { Ref: 'PublicSubnet1' }, 'PublicSubnet1'),
        PublicSubnet2: exportedOutput('Second public subnet', { Ref: 'PublicSubnet2' }, 'PublicSubnet2')
      }
    };
  }

  private createContainerTemplate(context: GeneratorContext): CloudFormationTemplate {
    return {
      AWSTemplateFormatVersion: '2010-09-09',
      Description: 'ECS cluster and public Application Load Balancer',
      Parameters: {
        NetworkStackName: stackNameParameter('network', context)
      },
      Resources: {
        Cluster: { Type: 'AWS::ECS::Cluster' },
        LoadBalancerSecurityGroup: {
          Type: 'AWS::EC2::SecurityGroup',
          Properties: {
            GroupDescription: 'Access to the public load balancer',
            VpcId: importValue('NetworkStackName', 'VpcId'),
            SecurityGroupIngress: [
              { CidrIp: '0.0.0.0/0', IpProtocol: 'tcp', FromPort: 80, ToPort: 80 }
            ]
          }
        },
        LoadBalancer: {
          Type: 'AWS::ElasticLoadBalancingV2::LoadBalancer',
          Properties: {
            Scheme: 'internet-facing',
            Subnets: [
              importValue('NetworkStackName', 'PublicSubnet1'),
              importValue('NetworkStackName', 'PublicSubnet2')
            ],
            SecurityGroups: [{ Ref: 'LoadBalancerSecurityGroup' }]
          }
        },
        DefaultTargetGroup: {
          Type: 'AWS::ElasticLoadBalancingV2::TargetGroup',
          Properties: {
            Port: 80,
            Protocol: 'HTTP',
            TargetType: 'ip',
            VpcId: importValue('NetworkStackName', 'VpcId')
          }
        },
        LoadBalancerListener: {
          Type: 'AWS::ElasticLoadBalancingV2::Listener',
          Properties: {
            LoadBalancerArn: { Ref: 'LoadBalancer' },
            Port: 80,
            Protocol: 'HTTP',
            DefaultActions: [
              { Type: 'forward', TargetGroupArn: { Ref: 'DefaultTargetGroup' } }
            ]
          }
        }
      },
      Outputs: {
        ClusterName: exportedOutput('ECS cluster name', { Ref: 'Cluster' }, 'ClusterName'),
        ListenerArn: exportedOutput('Load balancer listener', { Ref: 'LoadBalancerListener' }, 'ListenerArn'),
        LoadBalancerSecurityGroup: exportedOutput(
          'Security group of the load balancer',
          { Ref: 'LoadBalancerSecurityGroup' },
          'LoadBalancerSecurityGroup'
        ),
        LoadBalancerUrl: exportedOutput(
          'Public DNS name of the load balancer',
          { 'Fn::GetAtt': ['LoadBalancer', 'DNSName'] },
          'LoadBalancerUrl'
        )
      }
    };
  }

  private createServiceTemplate(context: GeneratorContext): CloudFormationTemplate {
    return {
      AWSTemplateFormatVersion: '2010-09-09',
      Description: 'Fargate service behind the shared load balancer',
      Parameters: {
        NetworkStackName: stackNameParameter('network', context),
        ContainerStackName: stackNameParameter('container', context),
        ServiceName: { Type: 'String', Default: 'app', Description: 'Name of the service and its container' },
        ImageUrl: { Type: 'String', Default: 'nginx:latest', Description: 'Container image to run' },
        ContainerPort: { Type: 'Number', Default: 80 },
        ContainerCpu: { Type: 'Number', Default: 256 },
        ContainerMemory: { Type: 'Number', Default: 512 },
        DesiredCount: { Type: 'Number', Default: 1 },
        HealthCheckPath: { Type: 'String', Default: '/' },
        ListenerRulePriority: { Type: 'Number', Default: 1 }
      },
      Resources: {
        LogGroup: {
          Type: 'AWS::Logs::LogGroup',
          Properties: {
            LogGroupName: { 'Fn::Sub': '/ecs/${ServiceName}' },
            RetentionInDays: 14
          }
        },
        TaskExecutionRole: {
          Type: 'AWS::IAM::Role',
          Properties: {
            AssumeRolePolicyDocument: {
              Version: '2012-10-17',
              Statement: [
                {
                  Effect: 'Allow',
                  Principal: { Service: 'ecs-tasks.amazonaws.com' },
                  Action: 'sts:AssumeRole'
                }
              ]
            },
            ManagedPolicyArns: [
              'arn:aws:iam::aws:policy/service-role/AmazonECSTaskExecutionRolePolicy'
            ]
          }
        },
        ServiceSecurityGroup: {
          Type: 'AWS::EC2::SecurityGroup',
          Properties: {
            GroupDescription: 'Access to the service from the load balancer',
            VpcId: importValue('NetworkStackName', 'VpcId'),
            SecurityGroupIngress: [
              {
                SourceSecurityGroupId: importValue('ContainerStackName', 'LoadBalancerSecurityGroup'),
                IpProtocol: 'tcp',
                FromPort: { Ref: 'ContainerPort' },
                ToPort: { Ref: 'ContainerPort' }
              }
            ]
          }
        },
        TaskDefinition: {
          Type: 'AWS::ECS::TaskDefinition',
          Properties: {
            Family: { Ref: 'ServiceName' },
            Cpu: { Ref: 'ContainerCpu' },
            Memory: { Ref: 'ContainerMemory' },
            NetworkMode: 'awsvpc',
            RequiresCompatibilities: ['FARGATE'],
            ExecutionRoleArn: { 'Fn::GetAtt': ['TaskExecutionRole', 'Arn'] },
            ContainerDefinitions: [
              {
                Name: { Ref: 'ServiceName' },
                Image: { Ref: 'ImageUrl' },
                Essential: true,
                PortMappings: [{ ContainerPort: { Ref: 'ContainerPort' } }],
                LogConfiguration: {
                  LogDriver: 'awslogs',
                  Options: {
                    'awslogs-group': { Ref: 'LogGroup' },
                    'awslogs-region': { Ref: 'AWS::Region' },
                    'awslogs-stream-prefix': { Ref: 'ServiceName' }
                  }
                }
              }
            ]
          }
        },
        TargetGroup: {
          Type: 'AWS::ElasticLoadBalancingV2::TargetGroup',
          Properties: {
            HealthCheckPath: { Ref: 'HealthCheckPath' },
            HealthCheckIntervalSeconds: 30,
            HealthyThresholdCount: 2,
            UnhealthyThresholdCount: 3,
            Port: { Ref: 'ContainerPort' },
            Protocol: 'HTTP',
            TargetType: 'ip',
            VpcId: importValue('NetworkStackName', 'VpcId')
          }
        },
        ListenerRule: {
          Type: 'AWS::ElasticLoadBalancingV2::ListenerRule',
          Properties: {
            ListenerArn: importValue('ContainerStackName', 'ListenerArn'),
            Priority: { Ref: 'ListenerRulePriority' },
            Conditions: [{ Field: 'path-pattern', Values: ['*'] }],
            Actions: [{ Type: 'forward', TargetGroupArn: { Ref: 'TargetGroup' } }]
          }
        },
        Service: {
          Type: 'AWS::ECS::Service',
          DependsOn: 'ListenerRule',
          Properties: {
            ServiceName: { Ref: 'ServiceName' },
            Cluster: importValue('ContainerStackName', 'ClusterName'),
            LaunchType: 'FARGATE',
            DesiredCount: { Ref: 'DesiredCount' },
            TaskDefinition: { Ref: 'TaskDefinition' },
            NetworkConfiguration: {
              AwsvpcConfiguration: {
                AssignPublicIp: 'ENABLED',
                SecurityGroups: [{ Ref: 'ServiceSecurityGroup' }],
                Subnets: [
                  importValue('NetworkStackName', 'PublicSubnet1'),
                  importValue('NetworkStackName', 'PublicSubnet2')
                ]
              }
            },
            LoadBalancers: [
              {
                ContainerName: { Ref: 'ServiceName' },
                ContainerPort: { Ref: 'ContainerPort' },
                TargetGroupArn: { Ref: 'TargetGroup' }
              }
            ]
          }
        }
      },
      Outputs: {
        ServiceName: exportedOutput('ECS service name', { 'Fn::GetAtt': ['Service', 'Name'] }, 'ServiceName'),
        ContainerName: exportedOutput('Container name used in image definitions', { Ref: 'ServiceName' }, 'ContainerName')
      }
    };
  }

  private createPipelineTemplate(context: GeneratorContext): CloudFormationTemplate {
    const assumeRole = (service: string) => ({
      Version: '2012-10-17',
      Statement: [{ Effect: 'Allow', Principal: { Service: service }, Action: 'sts:AssumeRole' }]
    });

    return {
      AWSTemplateFormatVersion: '2010-09-09',
      Description: 'CodePipeline building the container image from GitHub and deploying it to the ECS service',
      Parameters: {
        ContainerStackName: stackNameParameter('container', context),
        ServiceStackName: stackNameParameter('service', context),
        GitHubOwner: { Type: 'String', Description: 'Owner of the application repository' },
        GitHubRepo: { Type: 'String', Description: 'Name of the application repository' },
        GitHubBranch: { Type: 'String', Default: 'main' },
        GitHubToken: { Type: 'String', NoEcho: true, Description: 'Token with repo and admin:repo_hook scopes' }
      },
      Resources: {
        Repository: { Type: 'AWS::ECR::Repository' },
        ArtifactBucket: { Type: 'AWS::S3::Bucket', DeletionPolicy: 'Retain' },
        CodeBuildServiceRole: {
          Type: 'AWS::IAM::Role',
          Properties: {
            AssumeRolePolicyDocument: assumeRole('codebuild.amazonaws.com'),
            Policies: [
              {
                PolicyName: 'codebuild',
                PolicyDocument: {
                  Version: '2012-10-17',
                  Statement: [
                    {
                      Effect: 'Allow',
                      Action: ['logs:CreateLogGroup', 'logs:CreateLogStream', 'logs:PutLogEvents', 'ecr:GetAuthorizationToken'],
                      Resource: '*'
                    },
                    {
                      Effect: 'Allow',
                      Action: ['s3:GetObject', 's3:PutObject', 's3:GetObjectVersion'],
                      Resource: { 'Fn::Sub': '${ArtifactBucket.Arn}/*' }
                    },
                    {
                      Effect: 'Allow',
                      Action: [
                        'ecr:BatchCheckLayerAvailability',
                        'ecr:CompleteLayerUpload',
                        'ecr:InitiateLayerUpload',
                        'ecr:PutImage',
                        'ecr:UploadLayerPart'
                      ],
                      Resource: { 'Fn::GetAtt': ['Repository', 'Arn'] }
                    }
                  ]
                }
              }
            ]
          }
        },
        CodePipelineServiceRole: {
          Type: 'AWS::IAM::Role',
          Properties: {
            AssumeRolePolicyDocument: assumeRole('codepipeline.amazonaws.com'),
            Policies: [
              {
                PolicyName: 'codepipeline',
                PolicyDocument: {
                  Version: '2012-10-17',
                  Statement: [
                    {
                      Effect: 'Allow',
                      Action: ['s3:PutObject', 's3:GetObject', 's3:GetObjectVersion', 's3:GetBucketVersioning'],
                      Resource: [
                        { 'Fn::GetAtt': ['ArtifactBucket', 'Arn'] },
                        { 'Fn::Sub': '${ArtifactBucket.Arn}/*' }
                      ]
                    },
                    {
                      Effect: 'Allow',
                      Action: [
                        'codebuild:StartBuild',
                        'codebuild:BatchGetBuilds',
                        'ecs:DescribeServices',
                        'ecs:DescribeTaskDefinition',
                        'ecs:DescribeTasks',
                        'ecs:ListTasks',
                        'ecs:RegisterTaskDefinition',
                        'ecs:UpdateService',
                        'iam:PassRole'
                      ],
                      Resource: '*'
                    }
                  ]
                }
              }
            ]
          }
        },
        CodeBuildProject: {
          Type: 'AWS::CodeBuild::Project',
          Properties: {
            ServiceRole: { Ref: 'CodeBuildServiceRole' },
            Artifacts: { Type: 'CODEPIPELINE' },
            Source: { Type: 'CODEPIPELINE', BuildSpec: 'buildspec.yml' },
            Environment: {
              ComputeType: 'BUILD_GENERAL1_SMALL',
              Image: 'aws/codebuild/standard:7.0',
              Type: 'LINUX_CONTAINER',
              PrivilegedMode: true,
              EnvironmentVariables: [
                { Name: 'AWS_DEFAULT_REGION', Value: { Ref: 'AWS::Region' } },
                {
                  Name: 'REPOSITORY_URI',
                  Value: { 'Fn::Sub': '${AWS::AccountId}.dkr.ecr.${AWS::Region}.amazonaws.com/${Repository}' }
                },
                { Name: 'CONTAINER_NAME', Value: importValue('ServiceStackName', 'ContainerName') }
              ]
            }
          }
        },
        Pipeline: {
          Type: 'AWS::CodePipeline::Pipeline',
          Properties: {
            RoleArn: { 'Fn::GetAtt': ['CodePipelineServiceRole', 'Arn'] },
            ArtifactStore: { Type: 'S3', Location: { Ref: 'ArtifactBucket' } },
            Stages: [
              {
                Name: 'Source',
                Actions: [
                  {
                    Name: 'App',
                    ActionTypeId: { Category: 'Source', Owner: 'ThirdParty', Provider: 'GitHub', Version: '1' },
                    Configuration: {
                      Owner: { Ref: 'GitHubOwner' },
                      Repo: { Ref: 'GitHubRepo' },
                      Branch: { Ref: 'GitHubBranch' },
                      OAuthToken: { Ref: 'GitHubToken' }
                    },
                    OutputArtifacts: [{ Name: 'App' }],
                    RunOrder: 1
                  }
                ]
              },
              {
                Name: 'Build',
                Actions: [
                  {
                    Name: 'Build',
                    ActionTypeId: { Category: 'Build', Owner: 'AWS', Provider: 'CodeBuild', Version: '1' },
                    Configuration: { ProjectName: { Ref: 'CodeBuildProject' } },
                    InputArtifacts: [{ Name: 'App' }],
                    OutputArtifacts: [{ Name: 'BuildOutput' }],
                    RunOrder: 1
                  }
                ]
              },
              {
                Name: 'Deploy',
                Actions: [
                  {
                    Name: 'Deploy',
                    ActionTypeId: { Category: 'Deploy', Owner: 'AWS', Provider: 'ECS', Version: '1' },
                    Configuration: {
                      ClusterName: importValue('ContainerStackName', 'ClusterName'),
                      ServiceName: importValue('ServiceStackName', 'ServiceName'),
                      FileName: 'imagedefinitions.json'
                    },
                    InputArtifacts: [{ Name: 'BuildOutput' }],
                    RunOrder: 1
                  }
                ]
              }
            ]
          }
        }
      },
      Outputs: {
        PipelineUrl: {
          Description: 'Console URL of the pipeline',
          Value: { 'Fn::Sub': 'https://console.aws.amazon.com/codepipeline/home?region=${AWS::Region}#/view/${Pipeline}' }
        },
        RepositoryUri: exportedOutput(
          'Image repository',
          { 'Fn::Sub': '${AWS::AccountId}.dkr.ecr.${AWS::Region}.amazonaws.com/${Repository}' },
          'RepositoryUri'
        )
      }
    };
  }
}
