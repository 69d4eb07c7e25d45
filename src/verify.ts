import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { OAuth2Client } from "google-auth-library";
import { WebhookAuthError } from "./errors.js";

export const CHAT_ISSUER = "chat@system.gserviceaccount.com";
const CHAT_CERTS_URL = `https://www.googleapis.com/service_accounts/v1/metadata/x509/${CHAT_ISSUER}`;
const DEFAULT_CERT_TTL_MS = 60 * 60 * 1000;

/** Decides whether an inbound webhook call really comes from Google Chat. */
export interface RequestVerifier {
  verify(authorization: string | undefined): Promise<void>;
}

/** Used when no project number is configured. */
export const allowAllVerifier: RequestVerifier = {
  async verify() {},
};

export function bearerTokenOf(authorization: string | undefined): string {
  const match = authorization?.match(/^Bearer\s+(\S+)$/i);
  if (!match?.[1]) throw new WebhookAuthError("missing bearer token");
  return match[1];
}

function maxAgeMs(cacheControl: unknown): number {
  if (typeof cacheControl !== "string") return DEFAULT_CERT_TTL_MS;
  const match = cacheControl.match(/max-age=(\d+)/);
  return match?.[1] ? Number(match[1]) * 1000 : DEFAULT_CERT_TTL_MS;
}

/**
 * Verifies the JWT Chat attaches to every request: signed by the Chat system
 * account and addressed to this app's project number.
 */
export class ChatTokenVerifier implements RequestVerifier {
  private readonly oauth = new OAuth2Client();
  private readonly http: AxiosInstance;
  private certs: { pems: Record<string, string>; expiresAt: number } | null = null;

  constructor(
    private readonly projectNumber: string,
    adapter?: AxiosAdapter,
  ) {
    this.http = axios.create({ timeout: 10_000, adapter });
  }

  async verify(authorization: string | undefined): Promise<void> {
    const token = bearerTokenOf(authorization);
    const pems = await this.loadCerts();
    try {
      const ticket = await this.oauth.verifySignedJwtWithCertsAsync(token, pems, this.projectNumber, [CHAT_ISSUER]);
      if (ticket.getPayload()?.iss !== CHAT_ISSUER) {
        throw new WebhookAuthError("token was not issued by Google Chat");
      }
    } catch (error) {
      if (error instanceof WebhookAuthError) throw error;
      throw new WebhookAuthError(`invalid Chat token: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  }

  private async loadCerts(): Promise<Record<string, string>> {
    if (this.certs && this.certs.expiresAt > Date.now()) return this.certs.pems;
    try {
      const res = await this.http.get<Record<string, string>>(CHAT_CERTS_URL);
      this.certs = { pems: res.data, expiresAt: Date.now() + maxAgeMs(res.headers["cache-control"]) };
      return res.data;
    } catch (error) {
      throw new WebhookAuthError("could not load Google Chat signing certificates", { cause: error });
    }
  }
}
