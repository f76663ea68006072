import type { StructuredValue } from '@core/types/values';

/**
 * Chain of scopes a template is rendered against, root at the bottom.
 *
 * Immutable: `push` returns a new stack sharing this one as its parent, so a
 * section only ever extends its own view and siblings never see each other's
 * scopes.
 */
export class ContextStack {
  private constructor(
    readonly top: StructuredValue,
    private readonly parent?: ContextStack
  ) {}

  static root(context: StructuredValue): ContextStack {
    return new ContextStack(context);
  }

  push(scope: StructuredValue): ContextStack {
    return new ContextStack(scope, this);
  }

  /**
   * Scopes from innermost to outermost.
   */
  *scopes(): IterableIterator<StructuredValue> {
    let current: ContextStack | undefined = this;
    while (current) {
      yield current.top;
      current = current.parent;
    }
  }
}
