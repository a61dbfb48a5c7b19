import type { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

export class Logger {
  private readonly context: LoggerContext;
  private readonly sink: LogSink;

  constructor(context: LoggerContext, sink: LogSink = consoleSink) {
    this.context = context;
    this.sink = sink;
  }

  /** A logger that drops every line; used where a caller passes none. */
  static silent(component = "silent"): Logger {
    return new Logger({ component, runId: "none" }, () => undefined);
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, this.sink);
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.sink(level, JSON.stringify(payload));
  }
}
