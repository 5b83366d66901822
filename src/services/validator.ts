import { z } from "zod";
import { UnsupportedOptionError, ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  VM_ONLY_POWER_ACTIONS,
  type BackupRequest,
  type IsoRequest,
  type IssueCode,
  type OperationRequest,
  type SnapshotRequest,
  type ValidatedRequest,
  type ValidationIssue,
} from "../types.js";
import type { ResourceResolver } from "./resolver.js";

export type ValidationResult =
  | { ok: true; value: ValidatedRequest }
  | { ok: false; error: ValidationError | UnsupportedOptionError };

// ==================== Field constraints ====================

const nonEmpty = z
  .string()
  .min(1, "must not be empty")
  .refine((value) => value.trim() === value, "must not start or end with whitespace");
const vmid = z.number().int().positive();
const cpus = z.number().int().min(1).max(32);
const memory = z.number().int().min(512).max(131072);
const diskSize = z.number().int().min(5).max(1000);
const swap = z.number().int().min(0).max(131072);
const timeout = z.number().int().min(1).max(600);
const dnsName = z
  .string()
  .regex(/^[A-Za-z0-9]([A-Za-z0-9-]{0,61}[A-Za-z0-9])?(\.[A-Za-z0-9]([A-Za-z0-9-]{0,61}[A-Za-z0-9])?)*$/, "must be a valid DNS name");
const snapname = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_-]{1,39}$/, "must start with a letter and hold 2-40 letters, digits, '-' or '_'");
const downloadUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL");
const isoFilename = z.string().regex(/^[^/\\]+\.(iso|img)$/i, "must be a plain file name ending in .iso or .img");
const password = z.string().min(5, "must be at least 5 characters");
const checksum = z.string().regex(/^[0-9a-fA-F]+$/, "must be a hex digest");
const checksumAlgorithm = z.enum(["md5", "sha1", "sha224", "sha256", "sha384", "sha512"]);
const compress = z.enum(["0", "gzip", "lz4", "zstd"]);
const backupMode = z.enum(["snapshot", "suspend", "stop"]);
const diskFormat = z.enum(["raw", "qcow2"]);
const description = z.string().max(8192);
const notes = z.string().max(1024);

/** Field constraints shared by the request schemas and the tool argument shapes. */
export const fields = {
  nonEmpty,
  vmid,
  cpus,
  memory,
  diskSize,
  swap,
  timeout,
  dnsName,
  snapname,
  downloadUrl,
  isoFilename,
  password,
  checksum,
  checksumAlgorithm,
  compress,
  backupMode,
  diskFormat,
  description,
  notes,
};

const kind = z.enum(["vm", "container"]).optional();

const createVm = z.object({
  params: z.object({
    node: nonEmpty,
    vmid,
    name: dnsName.optional(),
    cpus,
    memory,
    disk_size: diskSize,
    storage: nonEmpty.optional(),
    ostype: nonEmpty.optional(),
    disk_format: diskFormat.optional(),
  }),
});

const createContainer = z.object({
  params: z.object({
    node: nonEmpty,
    vmid,
    hostname: dnsName,
    ostemplate: nonEmpty,
    cpus,
    memory,
    disk_size: diskSize,
    storage: nonEmpty.optional(),
    swap: swap.optional(),
    password: password.optional(),
    ssh_public_keys: nonEmpty.optional(),
    unprivileged: z.boolean().optional(),
  }),
});

const targeted = z.object({ target: nonEmpty, kind });

const schemas = {
  delete: targeted.extend({ force: z.boolean(), purge: z.boolean() }),
  power: targeted.extend({
    action: z.enum(["start", "stop", "shutdown", "reboot", "reset", "suspend", "resume"]),
    timeout: timeout.optional(),
  }),
  snapshotList: targeted,
  snapshotCreate: targeted.extend({
    snapname,
    description: description.optional(),
    vmstate: z.boolean(),
  }),
  snapshotNamed: targeted.extend({ snapname }),
  backupList: z.object({ node: nonEmpty.optional(), storage: nonEmpty.optional(), vmid: vmid.optional() }),
  backupCreate: targeted.extend({
    storage: nonEmpty,
    compress,
    mode: backupMode,
    notes: notes.optional(),
  }),
  backupRestore: z.object({
    node: nonEmpty,
    archive: nonEmpty,
    vmid,
    storage: nonEmpty.optional(),
    unique: z.boolean(),
  }),
  backupDelete: z.object({ node: nonEmpty, storage: nonEmpty, volid: nonEmpty }),
  isoList: z.object({ node: nonEmpty.optional(), storage: nonEmpty.optional() }),
  isoDownload: z.object({
    node: nonEmpty,
    storage: nonEmpty,
    url: downloadUrl,
    filename: isoFilename,
    checksum: checksum.optional(),
    checksum_algorithm: checksumAlgorithm.optional(),
  }),
  isoDelete: z.object({ node: nonEmpty, storage: nonEmpty, filename: nonEmpty }),
};

function snapshotSchema(request: SnapshotRequest): z.ZodTypeAny {
  switch (request.action) {
    case "list":
      return schemas.snapshotList;
    case "create":
      return schemas.snapshotCreate;
    case "delete":
    case "rollback":
      return schemas.snapshotNamed;
  }
}

function backupSchema(request: BackupRequest): z.ZodTypeAny {
  switch (request.action) {
    case "list":
      return schemas.backupList;
    case "create":
      return schemas.backupCreate;
    case "restore":
      return schemas.backupRestore;
    case "delete":
      return schemas.backupDelete;
  }
}

function isoSchema(request: IsoRequest): z.ZodTypeAny {
  switch (request.action) {
    case "list":
    case "list_templates":
      return schemas.isoList;
    case "download":
      return schemas.isoDownload;
    case "delete":
      return schemas.isoDelete;
  }
}

function schemaFor(request: OperationRequest): z.ZodTypeAny {
  switch (request.op) {
    case "create":
      return request.kind === "vm" ? createVm : createContainer;
    case "delete":
      return schemas.delete;
    case "power":
      return schemas.power;
    case "snapshot":
      return snapshotSchema(request);
    case "backup":
      return backupSchema(request);
    case "iso":
      return isoSchema(request);
  }
}

function issueCode(issue: z.ZodIssue): IssueCode {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return issue.received === "undefined" ? "required" : "invalid_type";
    case z.ZodIssueCode.too_small:
      return issue.type === "string" && issue.minimum === 1 ? "required" : "out_of_range";
    case z.ZodIssueCode.too_big:
    case z.ZodIssueCode.not_multiple_of:
      return "out_of_range";
    default:
      return "invalid_format";
  }
}

function fieldOf(path: (string | number)[]): string {
  // Create payloads nest under `params`; callers know the fields by their tool names.
  const segments = path[0] === "params" ? path.slice(1) : path;
  return segments.length > 0 ? segments.join(".") : "request";
}

/** One issue per field, in schema order. */
export function collectIssues(error: z.ZodError): ValidationIssue[] {
  const byField = new Map<string, ValidationIssue>();
  for (const issue of error.issues) {
    const field = fieldOf(issue.path);
    if (!byField.has(field)) {
      byField.set(field, { field, code: issueCode(issue), message: issue.message });
    }
  }
  return [...byField.values()];
}

function crossFieldIssues(request: OperationRequest): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  if (request.op === "snapshot" && request.action === "create" && request.vmstate && request.kind === "container") {
    issues.push({
      field: "vmstate",
      code: "unsupported_option",
      message: "memory-state snapshots are only available for VMs",
    });
  }
  if (request.op === "power" && request.kind === "container" && VM_ONLY_POWER_ACTIONS.includes(request.action)) {
    issues.push({
      field: "action",
      code: "unsupported_option",
      message: `'${request.action}' is only available for VMs`,
    });
  }
  return issues;
}

/** The vmid a request is about to claim, if any. */
function claimedVmid(request: OperationRequest): number | undefined {
  if (request.op === "create") return request.params.vmid;
  if (request.op === "backup" && request.action === "restore") return request.vmid;
  return undefined;
}

function freeze(request: OperationRequest): Readonly<OperationRequest> {
  if (request.op === "create") Object.freeze(request.params);
  return Object.freeze(request);
}

export class RequestValidator {
  constructor(
    private readonly resolver: ResourceResolver,
    private readonly logger: Logger
  ) {}

  async validate(request: OperationRequest): Promise<ValidationResult> {
    const parsed = schemaFor(request).safeParse(request);
    const issues = parsed.success ? [] : collectIssues(parsed.error);
    issues.push(...crossFieldIssues(request));

    const id = claimedVmid(request);
    if (id !== undefined && !issues.some((issue) => issue.field === "vmid")) {
      const existing = await this.resolver.lookup(String(id));
      if (existing.status !== "not_found") {
        issues.push({ field: "vmid", code: "in_use", message: `ID ${id} is already in use` });
      }
    }

    if (issues.length === 0) {
      return { ok: true, value: { request: freeze(request), validatedAt: new Date() } };
    }

    this.logger.debug("request rejected", { op: request.op, issues });
    if (issues.every((issue) => issue.code === "unsupported_option")) {
      return {
        ok: false,
        error: new UnsupportedOptionError(issues.map((issue) => issue.message).join("; "), issues),
      };
    }
    return { ok: false, error: new ValidationError(issues) };
  }
}
