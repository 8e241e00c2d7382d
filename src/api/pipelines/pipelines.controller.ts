import {
  Controller,
  Get,
  Post,
  Put,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
  BadRequestException,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { mapErrors } from 'src/api/http-errors';
import { CreatePipelineDto } from 'src/dto/create-pipeline.dto';
import { TriggerRunDto } from 'src/dto/trigger-run.dto';
import { UpdateConfigDto } from 'src/dto/update-config.dto';
import { UpdatePipelineDto } from 'src/dto/update-pipeline.dto';
import { checkRetryCount } from 'src/remote/retry';
import { TriggerService, type TriggerOptions } from 'src/triggers/trigger.service';
import { PipelinesService } from './pipelines.service';

/** Trigger request body, checked field by field; JSON bodies arrive untyped. */
export function triggerOptionsFrom(dto: TriggerRunDto): TriggerOptions {
  const errors: string[] = [];
  for (const [field, value] of [
    ['retry', dto.retry],
    ['monitor', dto.monitor],
  ] as const) {
    if (value !== undefined && typeof value !== 'boolean') errors.push(`${field} must be a boolean`);
  }
  if (dto.branch !== undefined && (typeof dto.branch !== 'string' || dto.branch.trim() === '')) {
    errors.push('branch must be a non-empty string');
  }
  if (dto.max_retries !== undefined) {
    try {
      checkRetryCount(dto.max_retries);
    } catch (err) {
      errors.push(err instanceof Error ? err.message : String(err));
    }
  }
  if (errors.length) throw new BadRequestException(errors);

  return {
    branch: dto.branch?.trim(),
    retry: dto.retry,
    maxRetries: dto.max_retries,
    monitor: dto.monitor,
  };
}

@ApiTags('pipelines')
@Controller('pipelines')
export class PipelinesController {
  constructor(
    private readonly pipelinesService: PipelinesService,
    private readonly triggers: TriggerService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List pipelines' })
  async findAll() {
    return this.pipelinesService.findAll();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one pipeline' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return mapErrors(this.pipelinesService.findOne(id));
  }

  @Post()
  @ApiOperation({ summary: 'Create a pipeline from a definition' })
  async create(@Body() dto: CreatePipelineDto) {
    return mapErrors(this.pipelinesService.create(dto));
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update deployment parameters' })
  async update(@Param('id', ParseUUIDPipe) id: string, @Body() dto: UpdatePipelineDto) {
    return mapErrors(this.pipelinesService.updateParameters(id, dto));
  }

  @Put(':id/config')
  @ApiOperation({ summary: 'Replace the definition (stored as a new version)' })
  async updateConfig(@Param('id', ParseUUIDPipe) id: string, @Body() dto: UpdateConfigDto) {
    return mapErrors(this.pipelinesService.updateConfig(id, dto.config));
  }

  @Get(':id/versions')
  @ApiOperation({ summary: 'List definition versions, newest first' })
  async versions(@Param('id', ParseUUIDPipe) id: string) {
    return mapErrors(this.pipelinesService.listVersions(id));
  }

  @Post(':id/activate')
  @ApiOperation({ summary: 'Make this the active pipeline of its repository' })
  async activate(@Param('id', ParseUUIDPipe) id: string) {
    return mapErrors(this.pipelinesService.activate(id));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a pipeline and stop monitoring its runs' })
  async remove(@Param('id', ParseUUIDPipe) id: string) {
    await mapErrors(this.pipelinesService.remove(id));
  }

  @Post(':id/test')
  @ApiOperation({ summary: 'Dry run the definition in the local sandbox' })
  async test(@Param('id', ParseUUIDPipe) id: string) {
    return mapErrors(this.pipelinesService.test(id));
  }

  @Post(':id/trigger')
  @ApiOperation({ summary: 'Trigger a run on the remote CI backend' })
  async trigger(@Param('id', ParseUUIDPipe) id: string, @Body() dto: TriggerRunDto) {
    return mapErrors(this.triggers.trigger(id, triggerOptionsFrom(dto)));
  }

  @Get(':id/runs')
  @ApiOperation({ summary: 'List runs of a pipeline, newest first' })
  async runs(@Param('id', ParseUUIDPipe) id: string, @Query('limit') limit?: string) {
    const take = limit ? Number.parseInt(limit, 10) : undefined;
    return mapErrors(this.pipelinesService.listRuns(id, take && take > 0 ? take : undefined));
  }
}
