import {
  canonicalHeaderName,
  decodeToString,
  type HttpRequest,
  type RequestHandler,
  StatusCode,
} from "@framewire/engine";

/** Human-readable listing of a parsed request, one line per element. */
export function formatRequestDump(request: HttpRequest): string {
  const { method, requestTarget, httpVersion } = request.requestLine;
  const lines = [
    "Request line:",
    `- Method: ${method}`,
    `- Target: ${requestTarget}`,
    `- Version: ${httpVersion}`,
    "Headers:",
  ];

  const names = [...request.headers.keys()].sort();
  if (names.length === 0) {
    lines.push("- (none)");
  }
  for (const name of names) {
    lines.push(`- ${canonicalHeaderName(name)}: ${request.headers.get(name)}`);
  }

  lines.push("Body:");
  lines.push(
    request.body === undefined ? "- (none)" : decodeToString(request.body),
  );
  return lines.join("\n");
}

/** Prints every request it receives and answers a plain `OK`. */
export function createDumpHandler(
  print: (text: string) => void,
): RequestHandler {
  return (request, writer) => {
    print(formatRequestDump(request));
    writer.status = StatusCode.OK;
    writer.headers.set("content-type", "text/plain");
    writer.setBody("OK");
  };
}
