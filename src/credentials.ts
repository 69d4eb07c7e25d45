import { GoogleAuth } from "google-auth-library";

export const CHAT_BOT_SCOPE = "https://www.googleapis.com/auth/chat.bot";

/** Source of short-lived bearer tokens for the Chat API. */
export interface CredentialProvider {
  getAccessToken(): Promise<string>;
}

/**
 * Application Default Credentials (GOOGLE_APPLICATION_CREDENTIALS, or the
 * metadata server on Cloud Run). google-auth-library caches and refreshes the
 * token itself, so calling this per reply is fine.
 */
export class GoogleCredentialProvider implements CredentialProvider {
  private readonly auth: GoogleAuth;

  constructor(auth?: GoogleAuth) {
    this.auth = auth ?? new GoogleAuth({ scopes: [CHAT_BOT_SCOPE] });
  }

  async getAccessToken(): Promise<string> {
    const token = await this.auth.getAccessToken();
    if (!token) throw new Error("Google credentials returned no access token");
    return token;
  }
}
