import { createNamingService } from './naming.js';

export interface InitOptions {
  name: string;
  region: string;
  environment?: string;
  githubOwner?: string;
  githubRepo?: string;
}

/**
 * Project file for the four built-in stages, in the order they must be deployed
 */
export function renderInitConfig(options: InitOptions, generatedAt: Date = new Date()): string {
  const environment = options.environment ?? 'production';

  return `# stackctl project configuration
# Generated on ${generatedAt.toISOString()}

project:
  name: ${options.name}
  environment: ${environment}

aws:
  region: \${AWS_REGION:-${options.region}}
  # profile: default  # Uncomment to use a specific AWS profile

settings:
  state_file: .stackctl/state.json
  stack_prefix: ${createNamingService().toStackPrefix(options.name)}
  poll_interval_seconds: 10
  timeout_minutes: 30
  tags:
    Environment: ${environment}

stages:
  - name: network
    template: builtin:network
    parameters:
      VpcCidr: 10.0.0.0/16
      PublicSubnet1Cidr: 10.0.0.0/24
      PublicSubnet2Cidr: 10.0.1.0/24

  - name: container
    template: builtin:container
    parameters:
      NetworkStackName: \${stack:network}

  - name: service
    template: builtin:service
    parameters:
      NetworkStackName: \${stack:network}
      ContainerStackName: \${stack:container}
      ServiceName: ${options.name}
      ContainerPort: 80

  - name: pipeline
    template: builtin:pipeline
    parameters:
      ContainerStackName: \${stack:container}
      ServiceStackName: \${stack:service}
      GitHubOwner: ${options.githubOwner ?? 'your-github-user'}
      GitHubRepo: ${options.githubRepo ?? options.name}
      GitHubBranch: main
      GitHubToken: \${GITHUB_TOKEN}  # needs the repo and admin:repo_hook scopes
`;
}
