import { ApiPropertyOptional } from '@nestjs/swagger';

export class TriggerRunDto {
  @ApiPropertyOptional({ description: "Branch to build (default: 'main')", example: 'main' })
  branch?: string;

  @ApiPropertyOptional({ description: 'Retry transient trigger failures (default true)' })
  retry?: boolean;

  @ApiPropertyOptional({ description: 'Overrides the configured retry count', example: 3, minimum: 0, maximum: 10 })
  max_retries?: number;

  @ApiPropertyOptional({ description: 'Start monitoring once the run is live (default true)' })
  monitor?: boolean;
}
