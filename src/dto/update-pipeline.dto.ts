import { ApiPropertyOptional } from '@nestjs/swagger';

/** Deployment parameters only; the definition changes through UpdateConfigDto. */
export class UpdatePipelineDto {
  @ApiPropertyOptional({ example: 'frontend-app' })
  name?: string;

  @ApiPropertyOptional()
  repository_url?: string | null;

  @ApiPropertyOptional({ example: 'deploy@10.0.0.5' })
  deployment_server?: string | null;

  @ApiPropertyOptional({ example: { NODE_ENV: 'production' } })
  environment_variables?: Record<string, string> | null;
}
