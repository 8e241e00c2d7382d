import { ApiProperty } from '@nestjs/swagger';

export class UpdateConfigDto {
  @ApiProperty({ description: 'New pipeline definition; stored as the next version' })
  config!: string;
}
