import {
  BackendError,
  ConflictError,
  NotFoundError,
  OperationError,
  TimedOutError,
  ValidationError,
  errorMessage,
} from "../errors.js";
import { BackendRequestError } from "../proxmox/backend.js";
import type { BackendPayload, OperationOutcome, TaskHandle, TaskSummary } from "../types.js";

// VM and container code paths word their errors differently ("VM 100 ..." vs
// "CT 100 ..."); the patterns below only use the parts both share.
const NOT_FOUND =
  /does not exist|not found|no such (vm|ct|container|storage|node|snapshot|volume|file|task)|unable to find/i;
const CONFLICT = /\blocked\b|can't lock file|already running|not running|is running|already exists/i;

const NOT_CANCELLED = "was not cancelled and may still complete; re-check the resource state.";

/** Maps a raw backend message, plus the exchange it came from, into the taxonomy. */
export function classifyMessage(message: string, payload?: BackendPayload): OperationError {
  const status = payload?.status;
  if (status === 404 || NOT_FOUND.test(message)) {
    return new NotFoundError(message, payload);
  }
  if (status === 409 || CONFLICT.test(message)) {
    return new ConflictError(message, payload);
  }
  if (status === 400 && payload?.errors && Object.keys(payload.errors).length > 0) {
    return new ValidationError(
      Object.entries(payload.errors).map(([field, reason]) => ({
        field,
        code: "invalid_format",
        message: reason.trim(),
      })),
      `Proxmox rejected the request: ${message}`
    );
  }
  return new BackendError(message, payload ?? { message });
}

export function classify(error: unknown): OperationError {
  if (error instanceof OperationError) return error;
  if (error instanceof BackendRequestError) return classifyMessage(error.message, error.toPayload());
  return new BackendError(errorMessage(error));
}

export function success(result: unknown, task?: TaskSummary): OperationOutcome {
  return {
    status: "success",
    ...(result !== undefined ? { result } : {}),
    ...(task ? { task } : {}),
  };
}

export function failure(error: unknown, task?: TaskSummary): OperationOutcome {
  return {
    status: "failed",
    error: classify(error).toDetail(),
    ...(task ? { task } : {}),
  };
}

export function timedOut(handle: TaskHandle, timeoutSeconds: number, elapsedMs: number): OperationOutcome {
  return {
    status: "timed_out",
    error: new TimedOutError(
      `Task ${handle.upid} did not finish within ${timeoutSeconds}s. It ${NOT_CANCELLED}`
    ).toDetail(),
    task: { upid: handle.upid, node: handle.node, elapsedMs },
  };
}

/** A failure that ended the wait for `subject`, not necessarily the work itself. */
export function interrupted(error: unknown, subject: string, task?: TaskSummary): OperationOutcome {
  const detail = classify(error).toDetail();
  return {
    status: "failed",
    error: { ...detail, message: `${detail.message.replace(/\.$/, "")}. ${subject} ${NOT_CANCELLED}` },
    ...(task ? { task } : {}),
  };
}
