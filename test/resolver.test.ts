import { beforeEach, describe, expect, it } from "vitest";
import { AmbiguousError, KindMismatchError, NotFoundError, ValidationError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { ResourceResolver, parseSelector } from "../src/services/resolver.js";
import { FakeBackend } from "./helpers.js";

describe("parseSelector", () => {
  it("recognises the four selector forms", () => {
    expect(parseSelector("200")).toEqual({ form: "id", id: 200 });
    expect(parseSelector("pve1:200")).toEqual({ form: "node-id", node: "pve1", id: 200 });
    expect(parseSelector("pve1/web")).toEqual({ form: "node-name", node: "pve1", name: "web" });
    expect(parseSelector(" web ")).toEqual({ form: "name", name: "web" });
  });

  it("rejects malformed selectors", () => {
    expect(parseSelector("")).toBeUndefined();
    expect(parseSelector("pve1:abc")).toBeUndefined();
    expect(parseSelector("/web")).toBeUndefined();
    expect(parseSelector("pve1:2/x")).toBeUndefined();
  });
});

describe("ResourceResolver", () => {
  let backend: FakeBackend;
  let resolver: ResourceResolver;

  beforeEach(() => {
    backend = new FakeBackend();
    backend.addVm(100, "db");
    backend.addVm(101, "web", "pve1");
    backend.addContainer(200, "web", "pve2");
    backend.addContainer(201, "proxy", "pve1");
    resolver = new ResourceResolver(backend, silentLogger);
  });

  it("resolves an id to exactly one ref", async () => {
    await expect(resolver.resolve("200")).resolves.toEqual({ node: "pve2", kind: "container", id: 200, name: "web" });
  });

  it("resolves node:id and node/name", async () => {
    await expect(resolver.resolve("pve1:101")).resolves.toMatchObject({ kind: "vm", id: 101 });
    await expect(resolver.resolve("pve1/proxy")).resolves.toMatchObject({ kind: "container", id: 201 });
  });

  it("reports every candidate when a name matches a VM and a container", async () => {
    const result = await resolver.lookup("web");
    expect(result).toEqual({
      status: "ambiguous",
      candidates: [
        { node: "pve1", kind: "vm", id: 101, name: "web" },
        { node: "pve2", kind: "container", id: 200, name: "web" },
      ],
    });
    await expect(resolver.resolve("web")).rejects.toBeInstanceOf(AmbiguousError);
  });

  it("stays ambiguous even when the caller names a kind", async () => {
    await expect(resolver.resolve("web", "container")).rejects.toBeInstanceOf(AmbiguousError);
  });

  it("raises KindMismatch when the match has the other kind", async () => {
    const error = await resolver.resolve("100", "container").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(KindMismatchError);
    expect(error).toHaveProperty("message", "100 on pve is a vm, not a container");
  });

  it("raises NotFound for unknown selectors", async () => {
    await expect(resolver.resolve("999")).rejects.toBeInstanceOf(NotFoundError);
    await expect(resolver.resolve("pve2:100", "vm")).rejects.toThrow("No vm matches 'pve2:100'");
  });

  it("rejects malformed selectors as validation errors", async () => {
    await expect(resolver.lookup("pve1:abc")).rejects.toBeInstanceOf(ValidationError);
  });

  it("gives the same answer on repeated calls against unchanged inventory", async () => {
    const first = await resolver.resolve("pve1:101");
    const second = await resolver.resolve("pve1:101");
    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("reads inventory on every call", async () => {
    await expect(resolver.lookup("300")).resolves.toEqual({ status: "not_found" });
    backend.addVm(300, "new");
    await expect(resolver.lookup("300")).resolves.toMatchObject({ status: "found" });
  });
});
