export interface TelnyxRequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface PlaceCallResult {
  callId: string;
}

/** Outbound call origination. */
export interface TelephonyClient {
  placeCall(toNumber: string, callbackUrl: string): Promise<PlaceCallResult>;
}
