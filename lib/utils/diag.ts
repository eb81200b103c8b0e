const MAX_EVENTS = 200;

type DiagEvent = { ts: number; source: string; message: string; data?: unknown };

const store: DiagEvent[] = [];

// Read on every call so .env.local (loaded by the CLI) and tests can toggle it.
export const isDiagEnabled = () => process.env.DIAG_CONVERT === '1';

export const recordDiag = (source: string, message: string, data?: unknown) => {
  if (!isDiagEnabled()) return;
  const entry: DiagEvent = { ts: Date.now(), source, message, data };
  store.push(entry);
  if (store.length > MAX_EVENTS) store.splice(0, store.length - MAX_EVENTS);
  if (data === undefined) console.log(`[Diag] ${source}: ${message}`);
  else console.log(`[Diag] ${source}: ${message}`, data);
};

export const getDiagEvents = (): DiagEvent[] => store.slice();

export const clearDiagEvents = () => {
  store.length = 0;
};
