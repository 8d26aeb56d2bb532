export function log(message: string, source = "express"): void {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

export function logError(source: string, message: string, err?: unknown): void {
  const detail = err === undefined ? "" : `: ${err instanceof Error ? err.message : String(err)}`;
  console.error(`[${source}] ${message}${detail}`);
}
