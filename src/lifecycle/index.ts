/**
 * Request lifecycle: at most one request in flight, superseded requests torn
 * down before their replacement starts.
 */

import { GeminiError } from '../errors';
import { GemtextElement, PresentationSink, Url, formatUrl } from '../types';
import { Logger, createNoopLogger } from '../observability';

/**
 * Anything a scope closes when it ends.
 */
export interface ClosableResource {
  close(): void;
}

/**
 * Request scope states.
 */
export enum ScopeState {
  Active = 'active',
  Completed = 'completed',
  Cancelled = 'cancelled',
}

let scopeCounter = 0;

/**
 * Groups the resources of one request (its connections and the abort signal
 * of its async task) so they can be released together.
 */
export class RequestScope {
  /** Scope ID, unique per process. */
  readonly id: string;
  /** Url the request was started for. */
  readonly url: Url;
  private readonly controller = new AbortController();
  private readonly resources = new Set<ClosableResource>();
  private readonly logger: Logger;
  private state: ScopeState = ScopeState.Active;

  constructor(url: Url, logger: Logger = createNoopLogger()) {
    this.id = `scope-${++scopeCounter}`;
    this.url = url;
    this.logger = logger;
  }

  /** Aborted when the scope is cancelled. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Whether the request may still touch shared state. */
  get isActive(): boolean {
    return this.state === ScopeState.Active;
  }

  /** Whether the scope was cancelled. */
  get isCancelled(): boolean {
    return this.state === ScopeState.Cancelled;
  }

  /** Current state. */
  getState(): ScopeState {
    return this.state;
  }

  /** Number of resources still registered. */
  get resourceCount(): number {
    return this.resources.size;
  }

  /**
   * Registers a resource and returns a function that unregisters it. A
   * resource registered after the scope ended is closed at once.
   */
  register(resource: ClosableResource): () => void {
    if (!this.isActive) {
      this.closeResource(resource);
      return () => undefined;
    }
    this.resources.add(resource);
    return () => {
      this.resources.delete(resource);
    };
  }

  /**
   * Throws a cancellation error if the scope was cancelled.
   */
  throwIfCancelled(): void {
    if (this.isCancelled) {
      throw GeminiError.cancelled();
    }
  }

  /**
   * Cancels the scope: fires the abort signal and closes every resource.
   * Returns false if the scope had already ended.
   */
  cancel(): boolean {
    if (!this.isActive) {
      return false;
    }
    this.state = ScopeState.Cancelled;
    this.controller.abort();
    this.closeAll();
    return true;
  }

  /**
   * Ends the scope normally and closes any resources left open.
   */
  complete(): void {
    if (!this.isActive) {
      return;
    }
    this.state = ScopeState.Completed;
    this.closeAll();
  }

  private closeAll(): void {
    for (const resource of this.resources) {
      this.closeResource(resource);
    }
    this.resources.clear();
  }

  private closeResource(resource: ClosableResource): void {
    try {
      resource.close();
    } catch (err) {
      this.logger.warn('Failed to release request resource', {
        scope: this.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/**
 * Body of a request, run inside its scope.
 */
export type RequestWork = (scope: RequestScope) => Promise<void>;

/**
 * One logical fetch.
 */
export interface RequestHandle {
  /** The request's scope. */
  readonly scope: RequestScope;
  /** Settles when the request has finished, failed or been cancelled. Never rejects. */
  readonly done: Promise<void>;
  /** Cancels this request if it is still the current one. */
  cancel(): void;
}

/**
 * Owns the single current request scope.
 */
export class RequestLifecycleManager {
  private current: RequestScope | null = null;
  private readonly logger: Logger;

  constructor(logger: Logger = createNoopLogger()) {
    this.logger = logger;
  }

  /**
   * Starts a request. The previous scope, if still active, is cancelled in
   * the same step that installs the new one, before the new work runs.
   */
  run(url: Url, work: RequestWork): RequestHandle {
    const scope = new RequestScope(url, this.logger);
    const previous = this.current;
    this.current = scope;

    if (previous?.cancel()) {
      this.logger.debug('Superseded request cancelled', {
        scope: previous.id,
        url: formatUrl(previous.url),
      });
    }

    const done = this.execute(scope, work);
    return {
      scope,
      done,
      cancel: () => {
        this.cancelScope(scope);
      },
    };
  }

  /**
   * Cancels the current request. Returns false if none was active.
   */
  cancel(): boolean {
    const scope = this.current;
    if (!scope) {
      return false;
    }
    return this.cancelScope(scope);
  }

  /** The current scope if it is still active. */
  activeScope(): RequestScope | null {
    return this.current?.isActive ? this.current : null;
  }

  /** Whether the scope is the current one. */
  isCurrent(scope: RequestScope): boolean {
    return this.current === scope;
  }

  private cancelScope(scope: RequestScope): boolean {
    if (this.current === scope) {
      this.current = null;
    }
    return scope.cancel();
  }

  private async execute(scope: RequestScope, work: RequestWork): Promise<void> {
    try {
      await work(scope);
    } catch (err) {
      if (scope.isActive) {
        this.logger.error('Request failed', err instanceof Error ? err : new Error(String(err)), {
          scope: scope.id,
        });
      } else {
        this.logger.debug('Request ended after cancellation', { scope: scope.id });
      }
    } finally {
      scope.complete();
      if (this.current === scope) {
        this.current = null;
      }
    }
  }
}

/**
 * Resolves to null when the signal aborts first.
 */
function unlessAborted<T>(promise: Promise<T | null>, signal: AbortSignal): Promise<T | null> {
  if (signal.aborted) {
    return Promise.resolve(null);
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(null);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Wraps a sink so that nothing reaches it once the scope has ended. Pending
 * prompts resolve to null when the scope is cancelled.
 */
export function scopeSink(sink: PresentationSink, scope: RequestScope): PresentationSink {
  return {
    clear: (): void => {
      if (scope.isActive) sink.clear();
    },
    insertElement: (element: GemtextElement): void => {
      if (scope.isActive) sink.insertElement(element);
    },
    insertRawText: (text: string): void => {
      if (scope.isActive) sink.insertRawText(text);
    },
    setAddress: (address: string): void => {
      if (scope.isActive) sink.setAddress(address);
    },
    setStatusMessage: (message: string): void => {
      if (scope.isActive) sink.setStatusMessage(message);
    },
    promptUser: async (title: string, message: string): Promise<string | null> => {
      if (!scope.isActive) return null;
      return unlessAborted(sink.promptUser(title, message), scope.signal);
    },
    chooseSaveDestination: async (suggestedName?: string): Promise<string | null> => {
      if (!scope.isActive) return null;
      return unlessAborted(sink.chooseSaveDestination(suggestedName), scope.signal);
    },
    showErrorDialog: (message: string): void => {
      if (scope.isActive) sink.showErrorDialog(message);
    },
  };
}
