function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').replace(/\.\d+Z/, '');
}

export function log(message: string): void {
  console.log(`[${timestamp()}] ${message}`);
}

export function logWarn(message: string): void {
  console.warn(`[${timestamp()}] WARN ${message}`);
}

export function logError(message: string): void {
  console.error(`[${timestamp()}] ERROR ${message}`);
}
