import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Mock } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BENIGN_PARSE_ERROR, DokuWiki } from "../client.js";
import { DokuWikiError, FileExistsError } from "../errors.js";
import { mediaFilename } from "../media.js";
import { XmlRpcParseError } from "../transport/errors.js";
import type { XmlRpcValue } from "../types.js";

const config = {
  url: "https://wiki.example.org",
  user: "alice",
  password: "test-secret",
};

type Call = (procedure: string, params: readonly XmlRpcValue[]) => Promise<XmlRpcValue>;

let call: Mock<Call>;
let wiki: DokuWiki;

beforeEach(() => {
  call = vi.fn<Call>();
  wiki = new DokuWiki(config, { call });
});

// --- pages ---

describe("wiki.pages", () => {
  it("lists the root namespace by default", async () => {
    call.mockResolvedValueOnce([]);

    await wiki.pages.list();

    expect(call).toHaveBeenCalledWith("dokuwiki.getPagelist", ["/"]);
  });

  it("passes every list option", async () => {
    call.mockResolvedValueOnce([]);

    await wiki.pages.list("projects", { depth: 2, hash: true, skipacl: false });

    expect(call).toHaveBeenCalledWith("dokuwiki.getPagelist", ["projects", { depth: 2, hash: true, skipacl: false }]);
  });

  it.each([
    ["get", "wiki.getPage", "wiki.getPageVersion"],
    ["info", "wiki.getPageInfo", "wiki.getPageInfoVersion"],
    ["html", "wiki.getPageHTML", "wiki.getPageHTMLVersion"],
  ] as const)("%s() picks the versioned command only with a version", async (method, latest, versioned) => {
    call.mockResolvedValue("x");

    await wiki.pages[method]("start");
    await wiki.pages[method]("start", 1700000000);

    expect(call).toHaveBeenNthCalledWith(1, latest, ["start"]);
    expect(call).toHaveBeenNthCalledWith(2, versioned, ["start", 1700000000]);
  });

  it("sends change summary and minor flag with set()", async () => {
    call.mockResolvedValueOnce(true);

    await expect(wiki.pages.set("start", "Hello", { sum: "typo", minor: true })).resolves.toBe(true);
    expect(call).toHaveBeenCalledWith("wiki.putPage", ["start", "Hello", { sum: "typo", minor: true }]);
  });

  it("appends content", async () => {
    call.mockResolvedValueOnce(true);

    await wiki.pages.append("log", "\n  * entry");

    expect(call).toHaveBeenCalledWith("dokuwiki.appendPage", ["log", "\n  * entry"]);
  });

  it("deletes a page by emptying it", async () => {
    call.mockResolvedValueOnce(true);

    await wiki.pages.delete("old");

    expect(call).toHaveBeenCalledWith("wiki.putPage", ["old", ""]);
  });

  it("forwards the listing commands", async () => {
    call.mockResolvedValue([]);

    await wiki.pages.changes(1700000000);
    await wiki.pages.search("apollo");
    await wiki.pages.versions("start");
    await wiki.pages.versions("start", 20);
    await wiki.pages.links("start");
    await wiki.pages.backlinks("start");

    expect(call.mock.calls).toEqual([
      ["wiki.getRecentChanges", [1700000000]],
      ["dokuwiki.search", ["apollo"]],
      ["wiki.getPageVersions", ["start", 0]],
      ["wiki.getPageVersions", ["start", 20]],
      ["wiki.listLinks", ["start"]],
      ["wiki.getBackLinks", ["start"]],
    ]);
  });

  it("returns the permission level", async () => {
    call.mockResolvedValueOnce(8);

    await expect(wiki.pages.permission("start")).resolves.toBe(8);
    expect(call).toHaveBeenCalledWith("wiki.aclCheck", ["start"]);
  });

  describe("locks", () => {
    const none = { locked: [], lockfail: [], unlocked: [], unlockfail: [] };

    it("locks a page", async () => {
      call.mockResolvedValueOnce({ ...none, locked: ["start"] });

      await wiki.pages.lock("start");

      expect(call).toHaveBeenCalledWith("dokuwiki.setLocks", [{ lock: ["start"], unlock: [] }]);
    });

    it("fails when the lock is refused", async () => {
      call.mockResolvedValueOnce({ ...none, lockfail: ["start"] });

      await expect(wiki.pages.lock("start")).rejects.toThrow(new DokuWikiError("unable to lock page: start"));
    });

    it("unlocks a page", async () => {
      call.mockResolvedValueOnce({ ...none, unlocked: ["start"] });

      await wiki.pages.unlock("start");

      expect(call).toHaveBeenCalledWith("dokuwiki.setLocks", [{ lock: [], unlock: ["start"] }]);
    });

    it("fails when the unlock is refused", async () => {
      call.mockResolvedValueOnce({ ...none, unlockfail: ["start"] });

      await expect(wiki.pages.unlock("start")).rejects.toThrow("unable to unlock page: start");
    });
  });
});

// --- media ---

describe("wiki.media", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "dokuwiki-media-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("lists media with options", async () => {
    call.mockResolvedValueOnce([]);

    await wiki.media.list("wiki", { pattern: "/\\.png$/", depth: 1 });

    expect(call).toHaveBeenCalledWith("wiki.getAttachments", ["wiki", { pattern: "/\\.png$/", depth: 1 }]);
  });

  it("returns the media bytes", async () => {
    call.mockResolvedValueOnce(Buffer.from("png-bytes"));

    const data = await wiki.media.get("wiki:logo.png");

    expect(data?.toString()).toBe("png-bytes");
    expect(call).toHaveBeenCalledWith("wiki.getAttachment", ["wiki:logo.png"]);
  });

  it("decodes base64 text when asked", async () => {
    call.mockResolvedValueOnce("aGVsbG8=");

    const data = await wiki.media.get("wiki:hello.txt", { b64decode: true });

    expect(data?.toString()).toBe("hello");
  });

  it("writes the media into a directory", async () => {
    call.mockResolvedValueOnce(Buffer.from("png-bytes"));
    const target = join(dir, "nested");

    const path = await wiki.media.get("wiki:logo.png", { dirpath: target });

    expect(path).toBe(join(target, "logo.png"));
    expect(await readFile(join(target, "logo.png"), "utf-8")).toBe("png-bytes");
  });

  it("uses the given filename", async () => {
    call.mockResolvedValueOnce(Buffer.from("png-bytes"));

    const path = await wiki.media.get("wiki:logo.png", { dirpath: dir, filename: "brand.png" });

    expect(path).toBe(join(dir, "brand.png"));
  });

  it("refuses to overwrite an existing file", async () => {
    await writeFile(join(dir, "logo.png"), "old");
    call.mockResolvedValueOnce(Buffer.from("new"));

    const err = await wiki.media.get("wiki:logo.png", { dirpath: dir }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FileExistsError);
    expect(err).toMatchObject({ code: "EEXIST", path: join(dir, "logo.png") });
    expect(await readFile(join(dir, "logo.png"), "utf-8")).toBe("old");
  });

  it("writes nothing when the server sends no value", async () => {
    call.mockRejectedValueOnce(new XmlRpcParseError(BENIGN_PARSE_ERROR));

    await expect(wiki.media.get("wiki:empty.png", { dirpath: dir })).resolves.toBeUndefined();
    await expect(readFile(join(dir, "empty.png"))).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("overwrites an existing file when asked", async () => {
    await writeFile(join(dir, "logo.png"), "old");
    call.mockResolvedValueOnce(Buffer.from("new"));

    await wiki.media.get("wiki:logo.png", { dirpath: dir, overwrite: true });

    expect(await readFile(join(dir, "logo.png"), "utf-8")).toBe("new");
  });

  it("uploads a local file", async () => {
    const source = join(dir, "notes.txt");
    await writeFile(source, "content");
    call.mockResolvedValueOnce("wiki:notes.txt");

    await wiki.media.add("wiki:notes.txt", source);

    expect(call).toHaveBeenCalledWith("wiki.putAttachment", ["wiki:notes.txt", Buffer.from("content"), { ow: true }]);
  });

  it("uploads bytes, base64 encoded when asked", async () => {
    call.mockResolvedValue("wiki:hello.txt");

    await wiki.media.set("wiki:hello.txt", Buffer.from("hello"), { overwrite: false });
    await wiki.media.set("wiki:hello.txt", new TextEncoder().encode("hello"), { b64encode: true });

    expect(call).toHaveBeenNthCalledWith(1, "wiki.putAttachment", ["wiki:hello.txt", Buffer.from("hello"), { ow: false }]);
    expect(call).toHaveBeenNthCalledWith(2, "wiki.putAttachment", ["wiki:hello.txt", "aGVsbG8=", { ow: true }]);
  });

  it("forwards info, changes and delete", async () => {
    call.mockResolvedValue(0);

    await wiki.media.info("wiki:logo.png");
    await wiki.media.changes(1700000000);
    await wiki.media.delete("wiki:logo.png");

    expect(call.mock.calls).toEqual([
      ["wiki.getAttachmentInfo", ["wiki:logo.png"]],
      ["wiki.getRecentMediaChanges", [1700000000]],
      ["wiki.deleteAttachment", ["wiki:logo.png"]],
    ]);
  });

  it("derives file names from media ids", () => {
    expect(mediaFilename("wiki:logo.png")).toBe("logo.png");
    expect(mediaFilename("projects/apollo:plan.pdf")).toBe("plan.pdf");
    expect(mediaFilename("a/b/c.txt")).toBe("c.txt");
  });
});

// --- structs ---

describe("wiki.structs", () => {
  it("reads struct data of the current revision", async () => {
    call.mockResolvedValueOnce({ project: { name: "Apollo" } });

    await expect(wiki.structs.getData("projects:apollo")).resolves.toEqual({ project: { name: "Apollo" } });
    expect(call).toHaveBeenCalledWith("plugin.struct.getData", ["projects:apollo", "", 0]);
  });

  it("saves struct data", async () => {
    call.mockResolvedValueOnce(true);

    await wiki.structs.saveData("projects:apollo", { project: { name: "Apollo", tags: ["a", "b"] } }, "rename", true);

    expect(call).toHaveBeenCalledWith("plugin.struct.saveData", [
      "projects:apollo",
      { project: { name: "Apollo", tags: ["a", "b"] } },
      "rename",
      true,
    ]);
  });

  it("reads one schema or all of them", async () => {
    call.mockResolvedValue({});

    await wiki.structs.getSchema();
    await wiki.structs.getSchema("project");

    expect(call).toHaveBeenNthCalledWith(1, "plugin.struct.getSchema", []);
    expect(call).toHaveBeenNthCalledWith(2, "plugin.struct.getSchema", ["project"]);
  });

  it("aggregates across schemas", async () => {
    call.mockResolvedValueOnce([]);

    await wiki.structs.getAggregationData(["project"], ["%pageid%", "name"], {
      filter: [{ logic: "and", condition: "status = active" }],
      sort: "^name",
    });
    await wiki.structs.getAggregationData(["project"], ["name"]);

    expect(call).toHaveBeenNthCalledWith(1, "plugin.struct.getAggregationData", [
      ["project"],
      ["%pageid%", "name"],
      [{ logic: "and", condition: "status = active" }],
      "^name",
    ]);
    expect(call).toHaveBeenNthCalledWith(2, "plugin.struct.getAggregationData", [["project"], ["name"], [], ""]);
  });
});
