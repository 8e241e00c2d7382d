import { ApiProperty } from '@nestjs/swagger';

export class RollbackDto {
  @ApiProperty({ example: 'Smoke tests failed after deploy' })
  reason!: string;
}
