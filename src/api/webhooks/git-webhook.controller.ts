import { Controller, Post, Body, BadRequestException, NotFoundException } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { mapErrors } from 'src/api/http-errors';
import { PipelinesService } from 'src/api/pipelines/pipelines.service';
import { TriggerType } from 'src/executions/execution-status';
import { DEFAULT_BRANCH, TriggerService } from 'src/triggers/trigger.service';

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

/**
 * Repository identifier from Bitbucket, GitHub or GitLab push payloads, or a bare `repo`.
 * Pipelines are matched on pipelines.repository (workspace/slug).
 */
export function getRepoFromPayload(body: Json): string | null {
  const direct = text(body.repo);
  if (direct) return direct;

  // Bitbucket and GitHub: repository.full_name
  if (isObject(body.repository)) {
    const fullName = text(body.repository.full_name);
    if (fullName) return fullName;
  }

  // GitLab: project.path_with_namespace
  if (isObject(body.project)) {
    const path = text(body.project.path_with_namespace);
    if (path) return path;
  }

  return null;
}

/** Pushed branch: Bitbucket push.changes[].new, or a `refs/heads/...` ref. */
export function getBranchFromPayload(body: Json): string | null {
  const direct = text(body.branch);
  if (direct) return direct;

  if (isObject(body.push) && Array.isArray(body.push.changes)) {
    for (const change of body.push.changes) {
      if (isObject(change) && isObject(change.new) && change.new.type === 'branch') {
        const name = text(change.new.name);
        if (name) return name;
      }
    }
  }

  const ref = text(body.ref);
  if (ref?.startsWith('refs/heads/')) return ref.slice('refs/heads/'.length);
  return null;
}

@Controller('webhooks/git')
@ApiTags('webhooks')
export class GitWebhookController {
  constructor(
    private readonly pipelinesService: PipelinesService,
    private readonly triggers: TriggerService,
  ) {}

  /**
   * Receive a push webhook, resolve the repository's active pipeline and trigger a run
   * on the pushed branch.
   */
  @Post('push')
  @ApiOperation({ summary: 'Receive a git push webhook and trigger a run' })
  @ApiBody({
    description: 'Bitbucket/GitHub/GitLab push payload, or { repo, branch }.',
    schema: { type: 'object', additionalProperties: true },
  })
  async handlePush(@Body() body: Json) {
    const repo = getRepoFromPayload(body);
    if (!repo) {
      throw new BadRequestException(
        'Missing repo. Send repo, repository.full_name, or project.path_with_namespace',
      );
    }

    const pipeline = await this.pipelinesService.findActiveByRepository(repo);
    if (!pipeline) {
      throw new NotFoundException(`No active pipeline found for repository: ${repo}`);
    }

    const run = await mapErrors(
      this.triggers.triggerPipeline(pipeline, {
        branch: getBranchFromPayload(body) ?? DEFAULT_BRANCH,
        triggerType: TriggerType.WEBHOOK,
      }),
    );
    return { runId: run.id, pipelineId: pipeline.id, status: run.status };
  }
}
