import { parse as parseYaml } from 'yaml';
import { invalid, valid, type ValidationResult } from './validation-result';

export interface PipelineStepDefinition {
  name: string;
  commands: string[];
  /** Execution image for this step; falls back to the definition image. */
  image?: string;
}

/** Parsed pipeline document: ordered steps, order fixed at parse time. */
export interface PipelineDefinition {
  image: string;
  steps: PipelineStepDefinition[];
}

export interface ParseOptions {
  /** Image used when neither the document nor the step names one. */
  defaultImage: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/** `image: foo` or `image: { name: foo }` */
function readImage(value: unknown): string | undefined {
  if (nonEmptyString(value)) return value.trim();
  if (isRecord(value) && nonEmptyString(value.name)) return value.name.trim();
  return undefined;
}

/**
 * Checks an already-structured definition. Zero steps, or a step without commands,
 * is invalid; nothing downstream should provision an environment for it.
 */
export function validateDefinition(definition: PipelineDefinition): ValidationResult<PipelineDefinition> {
  const errors: string[] = [];
  if (!nonEmptyString(definition.image)) errors.push('Pipeline image is required');
  if (definition.steps.length === 0) errors.push('Pipeline has no steps');

  definition.steps.forEach((step, index) => {
    const label = nonEmptyString(step.name) ? `"${step.name}"` : `#${index + 1}`;
    if (!nonEmptyString(step.name)) errors.push(`Step ${label} has no name`);
    if (step.commands.length === 0) errors.push(`Step ${label} has no commands`);
    if (step.commands.some((c) => !nonEmptyString(c))) {
      errors.push(`Step ${label} has an empty command`);
    }
  });

  return errors.length > 0 ? invalid(...errors) : valid(definition);
}

/**
 * Parse a Bitbucket-style pipeline document:
 *
 *   image: node:20
 *   pipelines:
 *     default:
 *       - step:
 *           name: build
 *           script: [npm ci, npm run build]
 *
 * Only the `default` pipeline is read. Steps run strictly in sequence, so
 * `parallel` groups and `pipe:` script entries are rejected.
 */
export function parsePipelineDefinition(
  document: string,
  options: ParseOptions,
): ValidationResult<PipelineDefinition> {
  let root: unknown;
  try {
    root = parseYaml(document);
  } catch (err) {
    return invalid(`Invalid YAML configuration: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isRecord(root)) return invalid('Pipeline document must be a mapping');
  const pipelines = root.pipelines;
  if (!isRecord(pipelines) || !Array.isArray(pipelines.default) || pipelines.default.length === 0) {
    return invalid('No default pipeline defined');
  }

  const image = readImage(root.image) ?? options.defaultImage;
  const errors: string[] = [];
  const steps: PipelineStepDefinition[] = [];

  pipelines.default.forEach((entry: unknown, index: number) => {
    if (isRecord(entry) && 'parallel' in entry) {
      errors.push(`Entry #${index + 1}: parallel steps are not supported`);
      return;
    }
    const step = isRecord(entry) ? entry.step : undefined;
    if (!isRecord(step)) {
      errors.push(`Entry #${index + 1} is not a step`);
      return;
    }

    const name = nonEmptyString(step.name) ? step.name.trim() : `Step ${index + 1}`;
    const script = Array.isArray(step.script) ? step.script : [];
    const commands: string[] = [];
    for (const line of script) {
      if (typeof line === 'string') {
        commands.push(line);
      } else if (typeof line === 'number' || typeof line === 'boolean') {
        commands.push(String(line));
      } else {
        errors.push(`Step "${name}": only shell commands are supported in script`);
      }
    }

    steps.push({ name, commands, image: readImage(step.image) });
  });

  if (errors.length > 0) return invalid(...errors);
  return validateDefinition({ image, steps });
}
