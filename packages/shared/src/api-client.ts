import { API_BASE_URL } from "./constants.js";
import type { PingResponse, ProbeLoginResponse, ResponseEnvelope } from "./types/envelope.js";
import type { Credentials, FetchInput } from "./types/request.js";

/** Non-2xx answer from the bridge; `status` tells a bad login (401) from a slow portal (504). */
export class BridgeRequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "BridgeRequestError";
    this.status = status;
  }
}

function describeErrorBody(body: unknown, fallback: string): string {
  if (typeof body === "object" && body !== null && "error" in body) {
    const { error } = body;
    if (typeof error === "string") return error;
    return JSON.stringify(error);
  }
  return fallback;
}

export class PortalBridgeClient {
  private baseUrl: string;
  private apiKey: string | undefined;

  constructor(baseUrl = API_BASE_URL, apiKey?: string) {
    this.baseUrl = baseUrl;
    this.apiKey = apiKey;
  }

  private async fetch<T>(path: string, init?: RequestInit): Promise<T> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) headers["x-api-key"] = this.apiKey;

    const res = await fetch(`${this.baseUrl}${path}`, { headers, ...init });

    if (!res.ok) {
      const body: unknown = await res.json().catch(() => ({ error: res.statusText }));
      throw new BridgeRequestError(res.status, describeErrorBody(body, `HTTP ${res.status}`));
    }

    return res.json() as Promise<T>;
  }

  async ping(): Promise<PingResponse> {
    return this.fetch<PingResponse>("/ping");
  }

  async fetchPortalData(input: FetchInput): Promise<ResponseEnvelope> {
    return this.fetch<ResponseEnvelope>("/portal/fetch", {
      method: "POST",
      body: JSON.stringify(input),
    });
  }

  async probeLogin(credentials: Credentials): Promise<ProbeLoginResponse> {
    const query = new URLSearchParams({
      username: credentials.username,
      password: credentials.password,
    });
    return this.fetch<ProbeLoginResponse>(`/probe/login?${query.toString()}`);
  }
}
