/** Request data the pipeline endpoints cannot accept. */
export class PipelineInputError extends Error {
  constructor(readonly errors: string[]) {
    super(errors.join('; '));
    this.name = 'PipelineInputError';
  }
}
