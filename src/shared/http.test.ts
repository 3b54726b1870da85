import { TimeoutError } from "ky";
import { describe, expect, it } from "vitest";
import { Session } from "../session/session.js";
import { isPlatformLoginPage } from "./auth.js";
import { AuthError, NetworkError, SchemaError } from "./errors.js";
import { createPlatformClient, type FetchLike, getJson, toTransportError } from "./http.js";

const URL_ = "https://video.example.test/section/sec-1/syllabus";
const session = new Session("https://video.example.test", [{ name: "sid", value: "test-secret" }]);

function clientWith(respond: (request: Request) => Response) {
  const fetch: FetchLike = async (input, init) =>
    respond(input instanceof Request ? input : new Request(input, init));
  return createPlatformClient(session, { fetch, timeoutMs: 1000 });
}

describe("toTransportError", () => {
  it("passes aborts through", () => {
    const abort = new DOMException("The operation was aborted", "AbortError");
    expect(toTransportError(abort, URL_)).toBe(abort);
  });

  it("wraps other failures as network errors", () => {
    const error = toTransportError(new TypeError("fetch failed"), URL_);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ message: `Request failed: ${URL_}`, details: "fetch failed" });
  });

  it("reports timeouts", () => {
    const error = toTransportError(new TimeoutError(new Request(URL_)), URL_);
    expect(error).toMatchObject({ code: "NETWORK_ERROR", message: `Request timed out: ${URL_}` });
  });
});

describe("getJson", () => {
  it("sends the session cookies and parses the body", async () => {
    let cookie: string | null = null;
    const client = clientWith((request) => {
      cookie = request.headers.get("cookie");
      return new Response('{"status":"ok"}', { status: 200 });
    });

    await expect(getJson(client, URL_, isPlatformLoginPage)).resolves.toEqual({ status: "ok" });
    expect(cookie).toBe("sid=test-secret");
  });

  it("maps 401 and 403 to AuthError", async () => {
    const client = clientWith(() => new Response("", { status: 403 }));

    await expect(getJson(client, URL_, isPlatformLoginPage)).rejects.toThrow(AuthError);
  });

  it("maps server errors to NetworkError with the status", async () => {
    const client = clientWith(() => new Response("", { status: 502 }));

    await expect(getJson(client, URL_, isPlatformLoginPage)).rejects.toMatchObject({
      code: "NETWORK_ERROR",
      statusCode: 502,
    });
  });

  it("treats a redirect to the login page as an expired session", async () => {
    const client = clientWith(() => {
      const response = new Response("<html></html>", { status: 200 });
      Object.defineProperty(response, "url", { value: "https://video.example.test/login" });
      return response;
    });

    await expect(getJson(client, URL_, isPlatformLoginPage)).rejects.toThrow(
      "Session expired: redirected to the login page"
    );
  });

  it("reports a body that is not JSON as SchemaError", async () => {
    const client = clientWith(() => new Response("<html></html>", { status: 200 }));

    await expect(getJson(client, URL_, isPlatformLoginPage)).rejects.toThrow(SchemaError);
  });
});
