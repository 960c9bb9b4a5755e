import { Backtrace } from '../backtrace/backtrace';

export interface RemoteErrorInit {
  name: string;
  display: string;
  debug: string;
  cause?: RemoteError;
  backtrace?: Backtrace;
}

/**
 * Stand-in for an error that was boxed in another execution context. It
 * reproduces the recorded renderings and, for the root, the recorded backtrace.
 */
export class RemoteError extends Error {
  private readonly rendered: string;
  private readonly trace: Backtrace | undefined;

  constructor(init: RemoteErrorInit) {
    super(init.display, init.cause ? { cause: init.cause } : undefined);
    this.name = init.name;
    this.rendered = init.debug;
    this.trace = init.backtrace;
  }

  display(): string {
    return this.message;
  }

  debug(): string {
    return this.rendered;
  }

  backtrace(): Backtrace | undefined {
    return this.trace;
  }
}
