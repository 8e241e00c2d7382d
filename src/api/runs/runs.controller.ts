import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { mapErrors } from 'src/api/http-errors';
import { LogQueryDto } from 'src/dto/log-query.dto';
import { RollbackDto } from 'src/dto/rollback.dto';
import { RunsService } from './runs.service';

function positiveInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

@ApiTags('runs')
@Controller('runs')
export class RunsController {
  constructor(private readonly runsService: RunsService) {}

  @Get()
  @ApiOperation({ summary: 'List runs (optionally filtered by pipelineId)' })
  async findAll(@Query('pipelineId') pipelineId?: string) {
    return this.runsService.findAll(pipelineId);
  }

  // Stored transcript with filters (must be before :id)
  @Get(':id/logs')
  @ApiOperation({ summary: 'Run transcript: search, level filter, pagination and summary' })
  async logs(@Param('id', ParseUUIDPipe) id: string, @Query() query: LogQueryDto) {
    return mapErrors(
      this.runsService.getLogs(id, {
        search: query.search,
        level: query.level,
        page: positiveInt(query.page),
        perPage: positiveInt(query.per_page),
      }),
    );
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one run' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return mapErrors(this.runsService.findOne(id));
  }

  @Post(':id/monitor')
  @ApiOperation({ summary: 'Start monitoring a live run' })
  async startMonitor(@Param('id', ParseUUIDPipe) id: string) {
    return mapErrors(this.runsService.startMonitor(id));
  }

  @Delete(':id/monitor')
  @ApiOperation({ summary: 'Stop monitoring a run (its stored status is left as is)' })
  async stopMonitor(@Param('id', ParseUUIDPipe) id: string) {
    return mapErrors(this.runsService.stopMonitor(id));
  }

  @Post(':id/rollback')
  @ApiOperation({ summary: 'Re-run the last successful commit before this run' })
  async rollback(@Param('id', ParseUUIDPipe) id: string, @Body() dto: RollbackDto) {
    if (typeof dto.reason !== 'string' || !dto.reason.trim()) {
      throw new BadRequestException('reason is required');
    }
    return mapErrors(this.runsService.rollback(id, dto.reason.trim()));
  }
}
