import bunyan from "bunyan";

const LEVELS: bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function resolveLevel(value: string | undefined): bunyan.LogLevelString {
  return LEVELS.find((level) => level === value) ?? "info";
}

const log = bunyan.createLogger({
  name: "tictactoe-server",
  level: resolveLevel(process.env.LOG_LEVEL),
});

export default log;
