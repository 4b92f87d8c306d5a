/** Thrown when a chunker is called with a size it cannot make progress with. */
export class ChunkingConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkingConfigError';
  }
}
