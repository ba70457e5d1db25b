import {
  getDefaultHeaders,
  type RequestHandler,
  reasonPhrase,
  type ResponseWriter,
  StatusCode,
} from "@framewire/engine";

/** Largest body the `/chunked/<n>` route will stream. */
export const MAX_STREAMED_BYTES = 1024 * 1024;

const CHUNKED_ROUTE = /^\/chunked\/(\d+)$/;

export function renderPage(
  status: number,
  heading: string,
  message: string,
): string {
  return `<html>
  <head>
    <title>${status} ${reasonPhrase(status)}</title>
  </head>
  <body>
    <h1>${heading}</h1>
    <p>${message}</p>
  </body>
</html>
`;
}

/** `n` bytes cycling through `a`..`z`. */
export function alphabetBytes(n: number): Uint8Array {
  const data = new Uint8Array(n);
  for (let i = 0; i < n; i++) {
    data[i] = 0x61 + (i % 26);
  }
  return data;
}

async function streamBytes(writer: ResponseWriter, n: number): Promise<void> {
  writer.headers.set("transfer-encoding", "chunked");
  await writer.writeStatusLine(StatusCode.OK);
  await writer.writeHeaders(getDefaultHeaders(0));
  await writer.writeChunkedBody(alphabetBytes(n));
}

export const demoHandler: RequestHandler = async (request, writer) => {
  const target = request.requestLine.requestTarget;

  const chunked = CHUNKED_ROUTE.exec(target);
  if (chunked) {
    const n = Number(chunked[1]);
    if (n <= MAX_STREAMED_BYTES) {
      await streamBytes(writer, n);
      return;
    }
  }

  writer.headers.set("content-type", "text/html");

  if (chunked || target === "/yourproblem") {
    writer.status = StatusCode.BAD_REQUEST;
    writer.setBody(
      renderPage(
        StatusCode.BAD_REQUEST,
        "Bad Request",
        "The request could not be served as sent.",
      ),
    );
    return;
  }

  if (target === "/myproblem") {
    writer.status = StatusCode.INTERNAL_SERVER_ERROR;
    writer.setBody(
      renderPage(
        StatusCode.INTERNAL_SERVER_ERROR,
        "Internal Server Error",
        "Something went wrong on our side.",
      ),
    );
    return;
  }

  writer.status = StatusCode.OK;
  writer.setBody(
    renderPage(StatusCode.OK, "Success!", "Your request was served."),
  );
};
