export type LogLevel = "debug" | "info" | "warn" | "error";

export type ParseStage =
  | "extract"
  | "container"
  | "package"
  | "manifest"
  | "spine"
  | "toc"
  | "assemble";

export interface LogContext {
  // Path context
  path?: string;
  directory?: string;
  file?: string;

  // Pipeline context
  stage?: ParseStage;
  duration_ms?: number;

  // Result context
  items_count?: number;
  spine_count?: number;
  toc_count?: number;
  has_cover?: boolean;
  direction?: string;

  // Error context
  code?: string;
  error?: string;
  error_stack?: string;

  // Misc
  callback?: string;
}

export interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  tag: string;
  msg: string;
}
