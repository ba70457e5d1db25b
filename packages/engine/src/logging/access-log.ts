export interface AccessLogEntry {
  remoteHost: string;
  /** `-` when the request line could not be parsed. */
  method: string;
  target: string;
  status: number;
  durationMs: number;
  error?: string;
}

/** `host\tmethod\ttarget\tstatus\tduration[\terr="..."]` */
export function formatAccessLogLine(entry: AccessLogEntry): string {
  const fields = [
    entry.remoteHost,
    entry.method,
    entry.target,
    String(entry.status),
    `${entry.durationMs.toFixed(1)}ms`,
  ];
  if (entry.error !== undefined) {
    fields.push(`err=${JSON.stringify(entry.error)}`);
  }
  return fields.join("\t");
}
