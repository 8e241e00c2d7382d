import { ApiPropertyOptional } from '@nestjs/swagger';

/** Query string of GET /runs/:id/logs; values arrive as strings. */
export class LogQueryDto {
  @ApiPropertyOptional({ description: 'Case-insensitive text filter' })
  search?: string;

  @ApiPropertyOptional({ enum: ['ERROR', 'WARN', 'INFO', 'DEBUG'] })
  level?: string;

  @ApiPropertyOptional({ example: 1 })
  page?: string;

  @ApiPropertyOptional({ example: 100 })
  per_page?: string;
}
