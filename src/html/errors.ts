/**
 * Errors raised while building an element tree
 */

/**
 * Raised when a tree would become malformed: a disallowed child kind,
 * a child that already has a parent, a cycle, or a text leaf being
 * given attributes or children.
 */
export class CompositionError extends Error {
  readonly operation: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    operation: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CompositionError';
    this.operation = operation;
    this.context = context;
  }
}
