const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);

/**
 * Base class for every error raised by the startup orchestrator.
 * Lets callers tell orchestration failures apart with a single instanceof check.
 */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

/**
 * Dependency cycle detected while resolving a component.
 *
 * `token` is the component that closed the cycle; `cycle` is the path from its
 * first occurrence back to itself.
 */
export class CycleDetectedError extends StartupError {
  constructor(
    public token: string,
    public cycle: string[]
  ) {
    const cycleStr = cycle.join(' → ');
    const message = format(`Cannot initialize ${token}. Cycle detected: ${cycleStr}`, [
      `Cannot initialize ${token}. Cycle detected:`,
      '',
      `  ${cycleStr}`,
      '',
      `${token} depends on itself through the components above.`,
      '',
      'To fix this:',
      '  1. Remove one of the dependencies() entries along the cycle',
      '  2. Move the shared setup into a separate component both can depend on',
    ]);
    super(message);
    this.name = 'CycleDetectedError';
  }
}

/**
 * Lookup or creation of a component failed.
 *
 * The component is not cached; resolving it again re-runs its initializer.
 */
export class InitializationFailedError extends StartupError {
  constructor(
    public token: string,
    cause: unknown
  ) {
    const dev = [
      `Initialization of ${token} failed.`,
      '',
      `  ${describeCause(cause)}`,
      '',
      `The component was not cached. See 'cause' for details; resolving ${token} again retries it.`,
    ];
    super(format(`Initialization of ${token} failed: ${describeCause(cause)}`, dev), { cause });
    this.name = 'InitializationFailedError';
  }
}

/**
 * First failure observed by a barrier wait over the launched jobs.
 * Failures of sibling jobs are not aggregated.
 */
export class AwaitAllFailedError extends StartupError {
  constructor(
    cause: unknown,
    public jobLabel: string
  ) {
    const dev = [
      'Startup job failed',
      '',
      `Job '${jobLabel}' failed: ${describeCause(cause)}`,
      '',
      'Other jobs were left running to completion. The job list is kept until a wait succeeds.',
    ];
    super(format(`Startup job '${jobLabel}' failed.`, dev), { cause });
    this.name = 'AwaitAllFailedError';
  }
}

export class InitializerNotFoundError extends StartupError {
  constructor(
    public token: string,
    public available: string[]
  ) {
    const parts: string[] = [`No initializer registered for ${token}.`, ''];

    if (available.length > 0 && available.length <= 10) {
      parts.push('Registered components:');
      available.forEach((c) => parts.push(`  - ${c}`));
      parts.push('');
    } else if (available.length > 10) {
      parts.push(`${available.length} components are registered.`, '');
    }

    parts.push('To fix this:');
    parts.push(`  1. Register an initializer for ${token} before resolving it`);
    parts.push('  2. Check that the same token instance is used for registration and dependencies');

    super(format(`No initializer registered for ${token}.`, parts));
    this.name = 'InitializerNotFoundError';
  }
}

export class InvalidInitializerError extends StartupError {
  constructor(
    public token: string,
    public received: unknown
  ) {
    let receivedString: string;
    try {
      receivedString = JSON.stringify(received) ?? String(received);
    } catch {
      receivedString = String(received);
    }

    const dev = [
      'Invalid initializer',
      '',
      `The factory registered for ${token} did not return an initializer.`,
      '',
      'Valid initializer shapes:',
      `  - syncInitializer({ dependencies, create })`,
      `  - asyncInitializer({ dependencies, create })`,
      `  - An object with kind 'sync' | 'async', dependencies() and create(context)`,
      '',
      'Received:',
      `  ${receivedString}`,
    ];
    super(format(`Factory for ${token} returned an invalid initializer.`, dev));
    this.name = 'InvalidInitializerError';
  }
}

export class DuplicateInitializerError extends StartupError {
  constructor(public token: string) {
    const dev = [
      'Duplicate initializer',
      '',
      `An initializer for ${token} is already registered.`,
      'Each component can have exactly one initializer per registry.',
    ];
    super(format(`Initializer for ${token} already registered.`, dev));
    this.name = 'DuplicateInitializerError';
  }
}

export class AsyncInitializerInSyncPathError extends StartupError {
  constructor(public token: string) {
    const dev = [
      'Async initializer in synchronous resolution',
      '',
      `${token} has an async initializer and cannot be created by resolveSync().`,
      'Use resolveAsync() or launchAsync(), or register it with an async kind descriptor.',
    ];
    super(format(`Async initializer for ${token} requires resolveAsync().`, dev));
    this.name = 'AsyncInitializerInSyncPathError';
  }
}

export class ThenableInSyncPathError extends StartupError {
  constructor(public token: string) {
    const dev = [
      'Sync initializer returned a Promise',
      '',
      `create() of ${token} is declared sync but returned a thenable.`,
      'Declare it with asyncInitializer() and resolve it with resolveAsync().',
    ];
    super(format(`Sync initializer for ${token} returned a Promise.`, dev));
    this.name = 'ThenableInSyncPathError';
  }
}

export class ConstructionInProgressError extends StartupError {
  constructor(public token: string) {
    const dev = [
      'Construction in progress',
      '',
      `${token} is being created by an async resolution and resolveSync() cannot wait for it.`,
      'Await resolveAsync() or awaitAll() before resolving it synchronously.',
    ];
    super(format(`${token} is already being created asynchronously.`, dev));
    this.name = 'ConstructionInProgressError';
  }
}

export class JobTimeoutError extends StartupError {
  constructor(
    public jobLabel: string,
    public timeoutMs: number
  ) {
    const dev = [
      'Startup job timed out',
      '',
      `Job '${jobLabel}' did not finish within ${timeoutMs}ms.`,
      'The underlying initialization keeps running; its result is ignored by the barrier.',
    ];
    super(format(`Startup job '${jobLabel}' timed out after ${timeoutMs}ms.`, dev));
    this.name = 'JobTimeoutError';
  }
}

export class DiscoveryFailedError extends StartupError {
  constructor(cause: unknown) {
    const dev = [
      'Component discovery failed',
      '',
      `  ${describeCause(cause)}`,
      '',
      'No component of the batch was initialized.',
    ];
    super(format(`Component discovery failed: ${describeCause(cause)}`, dev), { cause });
    this.name = 'DiscoveryFailedError';
  }
}

export class InvalidTokenError extends StartupError {
  constructor(public token: unknown) {
    let tokenString: string;
    try {
      tokenString = JSON.stringify(token) ?? String(token);
    } catch {
      tokenString = String(token);
    }

    const dev = [
      'Invalid component token',
      '',
      `Expected a token created with component('Name').`,
      '',
      'Received:',
      `  ${tokenString}`,
    ];
    super(format('Invalid component token.', dev));
    this.name = 'InvalidTokenError';
  }
}

export class InvalidDescriptorError extends StartupError {
  constructor(public descriptor: unknown) {
    let descriptorString: string;
    try {
      descriptorString = JSON.stringify(descriptor) ?? String(descriptor);
    } catch {
      descriptorString = String(descriptor);
    }

    const dev = [
      'Invalid initializer descriptor',
      '',
      `Expected { token, kind } with kind 'sync' or 'async'.`,
      '',
      'Received:',
      `  ${descriptorString}`,
    ];
    super(format('Invalid initializer descriptor.', dev));
    this.name = 'InvalidDescriptorError';
  }
}

export class InvalidOrchestratorConfigError extends StartupError {
  constructor(public reason: string) {
    const dev = ['Invalid orchestrator configuration', '', `Invalid orchestrator configuration: ${reason}`];
    super(format(`Invalid orchestrator configuration: ${reason}`, dev));
    this.name = 'InvalidOrchestratorConfigError';
  }
}
