import type { CommandReport } from "../core/dispatch/dispatcher";
import { formatReport } from "../core/dispatch/dispatcher";
import { describeOutcome } from "../outcome/matchers";

/**
 * Output events.
 * `source` is "main" for the interactive scope, otherwise the spawn's name.
 */
export type OutputEvent =
  | { kind: "report"; source: string; line: string; report: CommandReport }
  | { kind: "lifecycle"; source: string; message: string }
  | { kind: "error"; source: string; message: string };

/** JSON-safe form of an event. */
export type WireEvent = {
  kind: OutputEvent["kind"];
  source: string;
  line?: string;
  lines: string[];
  ok: boolean;
};

/**
 * Sink port interface.
 * Every status line the runtime produces goes through one of these.
 */
export interface OutputSink {
  emit(event: OutputEvent): void;
}

export function toWire(event: OutputEvent): WireEvent {
  switch (event.kind) {
    case "report":
      return {
        kind: event.kind,
        source: event.source,
        line: event.line,
        lines: formatReport(event.report),
        ok: event.report.results.every((r) => r.outcome.tag === "Done"),
      };
    case "lifecycle":
      return { kind: event.kind, source: event.source, lines: [event.message], ok: true };
    case "error":
      return { kind: event.kind, source: event.source, lines: [event.message], ok: false };
  }
}

export type ConsoleSinkOptions = {
  /** Echo each executed line before its results. */
  verbose?: boolean;
  /** Print lifecycle messages (spawn started, stopped). */
  lifecycle?: boolean;
};

/**
 * Console sink: successes to stdout, failures to stderr.
 * Lines from spawns are prefixed with `[name]`.
 */
export class ConsoleSink implements OutputSink {
  constructor(private readonly options: ConsoleSinkOptions = {}) {}

  emit(event: OutputEvent): void {
    const prefix = event.source === "main" ? "" : `[${event.source}] `;
    switch (event.kind) {
      case "report":
        if (this.options.verbose) console.log(`${prefix}> ${event.line}`);
        for (const { outcome } of event.report.results) {
          const text = describeOutcome(outcome);
          if (outcome.tag === "Done") console.log(`${prefix}${text}`);
          else console.error(`${prefix}${text}`);
        }
        break;
      case "lifecycle":
        if (this.options.lifecycle ?? true) console.log(`${prefix}${event.message}`);
        break;
      case "error":
        console.error(`${prefix}${event.message}`);
        break;
    }
  }
}

/** Keeps every event; used by tests and the HTTP service. */
export class MemorySink implements OutputSink {
  readonly events: OutputEvent[] = [];

  emit(event: OutputEvent): void {
    this.events.push(event);
  }

  /** Formatted lines from one source, in emission order. */
  lines(source?: string): string[] {
    return this.events
      .filter((e) => source === undefined || e.source === source)
      .flatMap((e) => toWire(e).lines);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/** Fans each event out to several sinks. */
export class TeeSink implements OutputSink {
  private readonly sinks: OutputSink[];

  constructor(...sinks: OutputSink[]) {
    this.sinks = sinks;
  }

  add(sink: OutputSink): void {
    this.sinks.push(sink);
  }

  remove(sink: OutputSink): void {
    const i = this.sinks.indexOf(sink);
    if (i >= 0) this.sinks.splice(i, 1);
  }

  emit(event: OutputEvent): void {
    for (const sink of this.sinks) {
      sink.emit(event);
    }
  }
}
