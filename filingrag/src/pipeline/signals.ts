import { describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export type PipelineStage =
  | "ResolvingCompany"
  | "SearchingDocuments"
  | "FetchingOrCached"
  | "Retrieving"
  | "Generating"
  | "Done"
  | "Failed";

export type WorkStage = Exclude<PipelineStage, "Done" | "Failed">;

export type StageSignal = {
  stage: PipelineStage;
  detail: string;
  timestamp: Date;
};

export type StageHandler = (signal: StageSignal) => void;

/**
 * In-process fan-out of stage signals. A throwing handler is logged and
 * skipped; it never reaches the pipeline.
 */
export class StageSignalBus {
  private readonly handlers = new Set<StageHandler>();

  constructor(private readonly logger: Logger = silentLogger) {}

  on(handler: StageHandler): void {
    this.handlers.add(handler);
  }

  off(handler: StageHandler): void {
    this.handlers.delete(handler);
  }

  emit(signal: StageSignal): void {
    for (const handler of this.handlers) {
      try {
        handler(signal);
      } catch (err: unknown) {
        this.logger.warn(`Stage handler failed on ${signal.stage}: ${describeError(err)}`);
      }
    }
  }
}
