export type LogLevel = "info" | "error";

export type LogFields = Record<string, unknown>;

export type Logger = {
  info: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
};

function line(level: LogLevel, message: string, fields?: LogFields): string {
  return JSON.stringify({ ts: new Date().toISOString(), level, message, ...fields });
}

/** At level "error" the info lines are dropped. */
export function createLogger(level: LogLevel = "info"): Logger {
  return {
    info: (message, fields) => {
      if (level !== "info") return;
      console.log(line("info", message, fields));
    },
    error: (message, fields) => {
      console.error(line("error", message, fields));
    },
  };
}
