/* ── error taxonomy ──────────────────────────────────────── */
export type ErrorCode =
  /* authorization */
  | "Unauthorized"
  /* configuration */
  | "DestinationChainNotAllowlisted"
  | "SourceChainNotAllowed"
  | "SenderNotAllowed"
  | "InvalidRouter"
  | "UnsupportedChain"
  | "AlreadyInitialized"
  | "NotInitialized"
  /* resources */
  | "InsufficientBalance"
  | "InsufficientAllowance"
  /* input */
  | "MalformedPayload"
  | "InvalidArgument"
  /* dispatch / ledger */
  | "UnknownSelector"
  | "SelectorAlreadyRegistered"
  | "MessageNotFailed"
  /* assets */
  | "UnknownToken"
  | "TokenNotOwned";

export class CrossChainError extends Error {
  override readonly name = "CrossChainError";

  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
  }
}

export const isCrossChainError = (
  e: unknown,
  code?: ErrorCode,
): e is CrossChainError =>
  e instanceof CrossChainError && (code === undefined || e.code === code);

/** Revert-reason text as stored in the failure ledger. */
export const reasonOf = (e: unknown): string => {
  if (e instanceof CrossChainError) return `${e.code}: ${e.message}`;
  if (e instanceof Error) return `Error: ${e.message}`;
  return `Error: ${String(e)}`;
};
