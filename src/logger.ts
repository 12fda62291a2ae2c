export type Logger = Pick<Console, "info" | "warn">;

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined
};
