import { GoogleAuth } from "google-auth-library";
import { CLOUD_PLATFORM_SCOPE } from "../constant.js";
import { AuthError } from "../model/error/ControlPlaneErrors.js";
import { log } from "../util/logger.js";

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

/**
 * Uses a token obtained elsewhere, e.g. `gcloud auth print-access-token`
 */
export class StaticAccessTokenProvider implements AccessTokenProvider {
  public constructor(private readonly token: string) {}

  public getAccessToken(): Promise<string> {
    if (this.token.trim() === "") {
      return Promise.reject(AuthError.fromError(new Error("Access token is empty")));
    }
    return Promise.resolve(this.token);
  }
}

/**
 * Application Default Credentials scoped to cloud-platform.
 * GoogleAuth caches the token and refreshes it once it expires.
 */
export class ApplicationDefaultCredentialsProvider implements AccessTokenProvider {
  public constructor(
    private readonly auth: Pick<GoogleAuth, "getAccessToken"> = new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] }),
  ) {}

  public async getAccessToken(): Promise<string> {
    let token: string | null | undefined;
    try {
      token = await this.auth.getAccessToken();
    } catch (error) {
      log.error("Failed to load or refresh default credentials");
      throw AuthError.fromError(error);
    }

    if (!token) {
      throw AuthError.fromError(new Error("Application Default Credentials returned no access token"));
    }
    return token;
  }
}

export function createAccessTokenProvider(options: { accessToken?: string }): AccessTokenProvider {
  if (options.accessToken) {
    log.debug("Using the configured access token");
    return new StaticAccessTokenProvider(options.accessToken);
  }

  log.debug("Using Application Default Credentials");
  return new ApplicationDefaultCredentialsProvider();
}
