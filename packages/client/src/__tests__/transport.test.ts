import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DokuWiki } from "../client.js";
import { CookieJar } from "../transport/cookies.js";
import { HttpStatusError, TransportError } from "../transport/errors.js";
import { XmlRpcTransport } from "../transport/http.js";
import { encodeMethodCall } from "../transport/xmlrpc.js";

const ENDPOINT = "https://wiki.example.org/lib/exe/xmlrpc.php";

// Mock global fetch
const mockFetch = vi.fn();

function xmlResponse(body: string, cookies: string[] = [], status = 200, statusText = "OK") {
  const headers = new Headers({ "Content-Type": "text/xml" });
  for (const cookie of cookies) headers.append("Set-Cookie", cookie);
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    headers,
    text: async () => body,
  };
}

function valueResponse(value: string, cookies: string[] = []) {
  return xmlResponse(
    `<?xml version="1.0"?>\n<methodResponse><params><param><value>${value}</value></param></params></methodResponse>`,
    cookies,
  );
}

function requestAt(index: number): { url: string; init: { method: string; headers: Record<string, string>; body: string; signal?: AbortSignal } } {
  const [url, init] = mockFetch.mock.calls[index];
  return { url, init };
}

describe("XmlRpcTransport", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the encoded call and decodes the answer", async () => {
    mockFetch.mockResolvedValueOnce(valueResponse("<string>Release 2024-02-06</string>"));
    const transport = new XmlRpcTransport({ endpoint: ENDPOINT });

    await expect(transport.call("dokuwiki.getVersion", [])).resolves.toBe("Release 2024-02-06");

    const { url, init } = requestAt(0);
    expect(url).toBe(ENDPOINT);
    expect(init.method).toBe("POST");
    expect(init.headers["Content-Type"]).toBe("text/xml");
    expect(init.body).toBe(encodeMethodCall("dokuwiki.getVersion", []));
    expect(init.signal).toBeUndefined();
  });

  it("sends extra headers and a timeout signal", async () => {
    mockFetch.mockResolvedValueOnce(valueResponse("<int>1</int>"));
    const transport = new XmlRpcTransport({ endpoint: ENDPOINT, headers: { "X-Trace": "t-1" }, timeoutMs: 5000 });

    await transport.call("dokuwiki.getTime", []);

    const { init } = requestAt(0);
    expect(init.headers["X-Trace"]).toBe("t-1");
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("stores cookies and sends them back, last value winning", async () => {
    const cookies = new CookieJar();
    const transport = new XmlRpcTransport({ endpoint: ENDPOINT, cookies });
    mockFetch
      .mockResolvedValueOnce(valueResponse("<boolean>1</boolean>", ["DokuWiki=abc123; path=/; HttpOnly", "DW7fa=xyz"]))
      .mockResolvedValueOnce(valueResponse("<string>x</string>", ["DokuWiki=def456; path=/"]))
      .mockResolvedValueOnce(valueResponse("<string>y</string>"));

    await transport.call("dokuwiki.login", ["alice", "test-secret"]);
    await transport.call("wiki.getPage", ["start"]);
    await transport.call("wiki.getPage", ["start"]);

    expect(requestAt(0).init.headers.Cookie).toBeUndefined();
    expect(requestAt(1).init.headers.Cookie).toBe("DokuWiki=abc123; DW7fa=xyz");
    expect(requestAt(2).init.headers.Cookie).toBe("DokuWiki=def456; DW7fa=xyz");
    expect(cookies.get("DokuWiki")).toBe("def456");
  });

  it("ignores cookies without a jar", async () => {
    const transport = new XmlRpcTransport({ endpoint: ENDPOINT });
    mockFetch
      .mockResolvedValueOnce(valueResponse("<boolean>1</boolean>", ["DokuWiki=abc123"]))
      .mockResolvedValueOnce(valueResponse("<string>x</string>"));

    await transport.call("dokuwiki.login", ["alice", "test-secret"]);
    await transport.call("wiki.getPage", ["start"]);

    expect(requestAt(1).init.headers.Cookie).toBeUndefined();
  });

  it("raises HttpStatusError for a non-2xx answer", async () => {
    mockFetch.mockResolvedValueOnce(xmlResponse("denied", [], 401, "Unauthorized"));
    const transport = new XmlRpcTransport({ endpoint: ENDPOINT });

    await expect(transport.call("dokuwiki.getVersion", [])).rejects.toMatchObject({
      name: "HttpStatusError",
      status: 401,
    });
  });

  it("releases the body of a non-2xx answer", async () => {
    const cancel = vi.fn(async () => {});
    mockFetch.mockResolvedValueOnce({ ...xmlResponse("oops", [], 500, "Internal Server Error"), body: { cancel } });
    const transport = new XmlRpcTransport({ endpoint: ENDPOINT });

    await expect(transport.call("dokuwiki.getVersion", [])).rejects.toThrow("HTTP 500: Internal Server Error");
    expect(cancel).toHaveBeenCalledOnce();
  });

  it("raises TransportError for a network failure", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
    const transport = new XmlRpcTransport({ endpoint: ENDPOINT });

    const err = await transport.call("dokuwiki.getVersion", []).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).not.toBeInstanceOf(HttpStatusError);
    expect(err).toHaveProperty("message", "dokuwiki.getVersion: request failed: fetch failed");
  });
});

describe("DokuWiki over HTTP", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const config = { url: "https://wiki.example.org/", user: "alice", password: "test-secret" };

  it("carries the credentials in the endpoint URI by default", async () => {
    mockFetch.mockResolvedValueOnce(valueResponse("<string>== Start ==</string>"));
    const wiki = new DokuWiki(config);

    await expect(wiki.pages.get("start")).resolves.toBe("== Start ==");
    expect(requestAt(0).url).toBe("https://wiki.example.org/lib/exe/xmlrpc.php?u=alice&p=test-secret");
  });

  it("logs in and reuses the session cookie in cookie mode", async () => {
    mockFetch
      .mockResolvedValueOnce(valueResponse("<boolean>1</boolean>", ["DokuWiki=abc123; path=/"]))
      .mockResolvedValueOnce(valueResponse("<string>Wiki</string>"));

    const wiki = await DokuWiki.connect({ ...config, cookieAuth: true });
    await wiki.title();

    expect(requestAt(0).url).toBe(ENDPOINT);
    expect(requestAt(0).init.body).toBe(encodeMethodCall("dokuwiki.login", ["alice", "test-secret"]));
    expect(requestAt(1).init.headers.Cookie).toBe("DokuWiki=abc123");
    expect(wiki.cookies?.get("DokuWiki")).toBe("abc123");
  });

  it("accepts a write acknowledged with a blank line before the declaration", async () => {
    mockFetch.mockResolvedValueOnce(
      xmlResponse(
        '\n<?xml version="1.0"?>\n<methodResponse><params><param><value><boolean>1</boolean></value></param></params></methodResponse>',
      ),
    );
    const wiki = new DokuWiki(config);

    await expect(wiki.pages.set("start", "Hello", { sum: "greeting" })).resolves.toBeUndefined();
  });

  it("returns an empty list for the no-results fault", async () => {
    mockFetch.mockResolvedValueOnce(
      xmlResponse(
        '<?xml version="1.0"?>\n<methodResponse><fault><value><struct>' +
          "<member><name>faultCode</name><value><int>321</int></value></member>" +
          "<member><name>faultString</name><value><string>No pages found</string></value></member>" +
          "</struct></value></fault></methodResponse>",
      ),
    );
    const wiki = new DokuWiki(config);

    await expect(wiki.pages.search("nothing")).resolves.toEqual([]);
  });
});
