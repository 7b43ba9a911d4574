/**
 * Post-commit event publishing.
 *
 * Components publish only after their state change is written. A sink
 * failure is reported to the logger and counted; it never reaches the
 * caller, so the committed change stands.
 */

import type { DiagnosticLogger, EventPayload, EventSink } from "@commitlock/types";

export class Notifier {
  private readonly _sink: EventSink;
  private readonly _source: string;
  private readonly _logger: DiagnosticLogger | undefined;
  private _failedPublishes = 0;

  constructor(sink: EventSink, source: string, logger?: DiagnosticLogger) {
    this._sink = sink;
    this._source = source;
    this._logger = logger;
  }

  emit(topic: string, payload: EventPayload): void {
    try {
      this._sink.publish(topic, payload);
    } catch (err: unknown) {
      this._failedPublishes++;
      this._logger?.warn(
        { err, topic, source: this._source },
        "Event publish failed after commit",
      );
    }
  }

  /** Number of publishes the sink rejected. */
  get failedPublishes(): number {
    return this._failedPublishes;
  }
}
