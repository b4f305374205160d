function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source = "express"): void {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function logWarn(message: string, source: string): void {
  console.warn(`${timestamp()} [${source}] ${message}`);
}

export function logError(message: string, source: string, err?: unknown): void {
  const detail = err === undefined ? "" : `: ${errorMessage(err)}`;
  console.error(`${timestamp()} [${source}] ${message}${detail}`);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
