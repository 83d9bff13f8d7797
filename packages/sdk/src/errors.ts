export type SDKErrorCode = "BRIDGE_NOT_CONNECTED" | "OPERATION_FAILED" | "AGENT_UNAVAILABLE";

/** Error thrown by the handles passed to handlers */
export class HandlerSDKError extends Error {
  readonly code: SDKErrorCode;

  constructor(message: string, code: SDKErrorCode) {
    super(message);
    this.name = "HandlerSDKError";
    this.code = code;
  }
}
