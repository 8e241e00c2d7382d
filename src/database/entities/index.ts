/**
 * Database entities: pipelines, pipeline_versions, execution_runs, poll_leases.
 */
export { Pipeline } from './pipeline.entity';
export { PipelineVersion } from './pipeline-version.entity';
export { ExecutionRun } from './execution-run.entity';
export { PollLease } from './poll-lease.entity';

import { Pipeline } from './pipeline.entity';
import { PipelineVersion } from './pipeline-version.entity';
import { ExecutionRun } from './execution-run.entity';
import { PollLease } from './poll-lease.entity';

export const ENTITIES = [Pipeline, PipelineVersion, ExecutionRun, PollLease];
