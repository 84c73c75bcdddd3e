export enum ErrorKind {
  UnknownTool = "UnknownTool",
  ValidationError = "ValidationError",
  InvalidProject = "InvalidProject",
  SpawnError = "SpawnError",
  Cancelled = "Cancelled",
  MethodNotFound = "MethodNotFound",
  InvalidParams = "InvalidParams",
  Internal = "Internal",
}

/** JSON-RPC error code emitted for each kind. */
export const ERROR_CODES: Record<ErrorKind, number> = {
  [ErrorKind.MethodNotFound]: -32601,
  [ErrorKind.InvalidParams]: -32602,
  [ErrorKind.Internal]: -32603,
  [ErrorKind.UnknownTool]: -32001,
  [ErrorKind.ValidationError]: -32002,
  [ErrorKind.InvalidProject]: -32003,
  [ErrorKind.SpawnError]: -32004,
  [ErrorKind.Cancelled]: -32800,
};

export class CargoMcpError extends Error {
  readonly kind: ErrorKind;
  readonly context?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "CargoMcpError";
    this.kind = kind;
    this.context = context;
  }
}

/** Wire shape of an error response's `error` member. */
export interface RpcErrorBody {
  readonly code: number;
  readonly kind: ErrorKind;
  readonly message: string;
}

export function toRpcError(err: unknown): RpcErrorBody {
  if (err instanceof CargoMcpError) {
    return { code: ERROR_CODES[err.kind], kind: err.kind, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { code: ERROR_CODES[ErrorKind.Internal], kind: ErrorKind.Internal, message };
}

/** The `code` of a Node system error ("ENOENT", "EACCES", …), if any. */
export function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}
