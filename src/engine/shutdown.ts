import type { StopSignal } from "./stop-signal";

const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export interface ShutdownCoordinatorOptions {
  stopSignal: StopSignal;
  signals?: readonly NodeJS.Signals[];
  process?: Pick<NodeJS.EventEmitter, "on" | "off">;
  /** Receives the acknowledgement line. Defaults to stdout. */
  acknowledge?: (line: string) => void;
}

export class ShutdownCoordinator {
  private readonly stopSignal: StopSignal;
  private readonly signals: readonly NodeJS.Signals[];
  private readonly processRef: Pick<NodeJS.EventEmitter, "on" | "off">;
  private readonly acknowledge: (line: string) => void;
  private readonly listeners = new Map<NodeJS.Signals, () => void>();

  constructor(options: ShutdownCoordinatorOptions) {
    this.stopSignal = options.stopSignal;
    this.signals = options.signals ?? DEFAULT_SIGNALS;
    this.processRef = options.process ?? process;
    this.acknowledge =
      options.acknowledge ??
      ((line) => {
        process.stdout.write(line);
      });
  }

  /** Subscribes to the termination signals. Subsequent calls are ignored. */
  start(): void {
    if (this.listeners.size > 0) {
      return;
    }

    for (const signal of this.signals) {
      const listener = () => {
        this.requestStop(signal);
      };
      this.listeners.set(signal, listener);
      this.processRef.on(signal, listener);
    }
  }

  dispose(): void {
    for (const [signal, listener] of this.listeners) {
      this.processRef.off(signal, listener);
    }
    this.listeners.clear();
  }

  /**
   * Closes the shared stop signal. Only the first request is acknowledged.
   */
  requestStop(signal: NodeJS.Signals): boolean {
    const transitioned = this.stopSignal.close(`received ${signal}`);

    if (transitioned) {
      this.acknowledge(`\nreceived ${signal} signal, terminating\n`);
    }

    return transitioned;
  }
}
