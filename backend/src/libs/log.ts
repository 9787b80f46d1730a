/** Structural subset of the pino logger Fastify exposes as `app.log` / `req.log`. */
export type Log = {
  info: (o: unknown, msg: string) => void;
  warn: (o: unknown, msg: string) => void;
  error: (o: unknown, msg: string) => void;
};

export const silentLog: Log = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
