import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CreatePipelineDto {
  @ApiProperty({ example: 'frontend-app' })
  name!: string;

  @ApiProperty({
    example: 'acme/frontend-app',
    description: 'Remote CI repository as workspace/slug. Must match what the push webhook sends.',
  })
  repository!: string;

  @ApiProperty({
    description: 'Pipeline definition (bitbucket-pipelines.yml). Stored as-is and versioned.',
    example: 'image: node:20\npipelines:\n  default:\n    - step:\n        name: build\n        script:\n          - npm ci\n',
  })
  config!: string;

  @ApiPropertyOptional({ description: 'Local path or clonable URL used by dry runs' })
  repository_url?: string;

  @ApiPropertyOptional({ example: 'deploy@10.0.0.5' })
  deployment_server?: string;

  @ApiPropertyOptional({ example: { NODE_ENV: 'production' } })
  environment_variables?: Record<string, string>;

  @ApiPropertyOptional({ description: 'Make this the active pipeline of its repository (default true)' })
  activate?: boolean;
}
