import { AmbiguousError, KindMismatchError, NotFoundError, ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { VirtualizationBackend } from "../proxmox/backend.js";
import type { ClusterResource } from "../proxmox/types.js";
import type { ResourceKind, ResourceRef } from "../types.js";

export type Selector =
  | { form: "id"; id: number }
  | { form: "node-id"; node: string; id: number }
  | { form: "node-name"; node: string; name: string }
  | { form: "name"; name: string };

export type ResolveResult =
  | { status: "found"; ref: ResourceRef }
  | { status: "not_found" }
  | { status: "ambiguous"; candidates: ResourceRef[] };

const DIGITS = /^\d+$/;

/**
 * Parses `"200"`, `"pve1:200"`, `"pve1/web"` or `"web"`.
 * Returns undefined for malformed input such as `"pve1:abc"` or `"/web"`.
 */
export function parseSelector(raw: string): Selector | undefined {
  const token = raw.trim();
  if (token === "") return undefined;

  if (DIGITS.test(token)) {
    return { form: "id", id: Number(token) };
  }

  const colon = token.indexOf(":");
  const slash = token.indexOf("/");
  if (colon > 0 && slash === -1) {
    const node = token.slice(0, colon);
    const id = token.slice(colon + 1).trim();
    return DIGITS.test(id) ? { form: "node-id", node, id: Number(id) } : undefined;
  }
  if (slash > 0 && colon === -1) {
    const node = token.slice(0, slash);
    const name = token.slice(slash + 1).trim();
    return name ? { form: "node-name", node, name } : undefined;
  }
  if (colon === -1 && slash === -1) {
    return { form: "name", name: token };
  }
  return undefined;
}

function kindOf(resource: ClusterResource): ResourceKind {
  return resource.type === "lxc" ? "container" : "vm";
}

function toRef(resource: ClusterResource): ResourceRef {
  const ref: ResourceRef = {
    node: resource.node,
    kind: kindOf(resource),
    id: Number(resource.vmid),
    ...(resource.name ? { name: resource.name } : {}),
  };
  return Object.freeze(ref);
}

function matches(selector: Selector, resource: ClusterResource): boolean {
  switch (selector.form) {
    case "id":
      return Number(resource.vmid) === selector.id;
    case "node-id":
      return resource.node === selector.node && Number(resource.vmid) === selector.id;
    case "node-name":
      return resource.node === selector.node && resource.name === selector.name;
    case "name":
      return resource.name === selector.name;
  }
}

/**
 * Resolves selectors against live cluster inventory. Nothing is cached: the
 * inventory is read again on every call.
 */
export class ResourceResolver {
  constructor(
    private readonly backend: VirtualizationBackend,
    private readonly logger: Logger
  ) {}

  async lookup(raw: string): Promise<ResolveResult> {
    const selector = parseSelector(raw);
    if (!selector) {
      throw new ValidationError([
        { field: "selector", code: "invalid_format", message: `Unrecognized selector '${raw}'` },
      ]);
    }

    const inventory = await this.backend.listResources();
    const found = inventory.filter((resource) => matches(selector, resource)).map(toRef);

    this.logger.trace("selector matched", { selector: raw, matches: found.length });
    if (found.length === 0) return { status: "not_found" };
    if (found.length > 1) return { status: "ambiguous", candidates: found };
    return { status: "found", ref: found[0] };
  }

  async resolve(raw: string, expectedKind?: ResourceKind): Promise<ResourceRef> {
    const result = await this.lookup(raw);
    switch (result.status) {
      case "not_found":
        throw new NotFoundError(
          expectedKind ? `No ${expectedKind} matches '${raw}'` : `No VM or container matches '${raw}'`
        );
      case "ambiguous":
        throw new AmbiguousError(raw, result.candidates);
      case "found":
        if (expectedKind && result.ref.kind !== expectedKind) {
          throw new KindMismatchError(result.ref, expectedKind);
        }
        return result.ref;
    }
  }
}
