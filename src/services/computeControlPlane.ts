import { COMPUTE_API_URL, GLOBAL_SCOPE, SCAN_DEFAULTS } from "../constant.js";
import { ControlPlaneError, NotFoundError, TransientError } from "../model/error/ControlPlaneErrors.js";
import { TrackerError } from "../model/error/TrackerError.js";
import { CertificateRecord, CertificateRef, FrontEnd } from "../types/certificate.js";
import { parseCertificateRef } from "../util/certificateHelpers.js";
import { log } from "../util/logger.js";
import { AccessTokenProvider } from "./credentials.js";
import { ControlPlaneClient } from "./interfaces/controlPlane.js";

interface TargetHttpsProxy {
  name: string;
  sslCertificates?: string[];
}

interface TargetHttpsProxyList {
  items?: TargetHttpsProxy[];
  nextPageToken?: string;
}

interface SslCertificate {
  name?: string;
  type?: string;
  certificate?: string;
}

export interface ComputeControlPlaneOptions {
  credentials: AccessTokenProvider;
  apiUrl?: string;
  /**
   * Regions whose regional HTTPS proxies are listed next to the global ones
   */
  regions?: string[];
  timeoutMs?: number;
}

function scopePath(scope: string): string {
  return scope === GLOBAL_SCOPE ? GLOBAL_SCOPE : `regions/${encodeURIComponent(scope)}`;
}

/**
 * Compute Engine REST API (v1) backed control plane
 */
export class ComputeControlPlane implements ControlPlaneClient {
  private readonly apiUrl: string;
  private readonly regions: string[];
  private readonly timeoutMs: number;

  public constructor(private readonly options: ComputeControlPlaneOptions) {
    this.apiUrl = (options.apiUrl ?? COMPUTE_API_URL).replace(/\/+$/, "");
    this.regions = options.regions ?? [];
    this.timeoutMs = options.timeoutMs ?? SCAN_DEFAULTS.TIMEOUT_MS;
  }

  public async listFrontEnds(projectId: string): Promise<FrontEnd[]> {
    const frontEnds: FrontEnd[] = [];

    for (const scope of [GLOBAL_SCOPE, ...this.regions]) {
      const proxies = await this.listTargetHttpsProxies(projectId, scope);
      log.info(`Found ${proxies.length} target HTTPS proxies in ${scope}`);

      for (const proxy of proxies) {
        frontEnds.push({
          name: proxy.name,
          scope,
          certificateReferences: proxy.sslCertificates ?? [],
        });
      }
    }

    return frontEnds;
  }

  public async fetchCertificate(ref: CertificateRef, signal?: AbortSignal): Promise<CertificateRecord> {
    const location = parseCertificateRef(ref);
    if (!location) {
      throw new NotFoundError(`Unrecognized certificate reference: ${ref}`, ref, [
        { code: "INVALID_REFERENCE", message: "Reference does not point at an SSL certificate" },
      ]);
    }

    const url = `${this.apiUrl}/projects/${encodeURIComponent(location.project)}/${scopePath(location.scope)}/sslCertificates/${encodeURIComponent(location.name)}`;
    const certificate = await this.request<SslCertificate>(url, ref, signal);
    const name = certificate.name ?? location.name;

    if (certificate.type === "MANAGED") {
      return { kind: "managed", name, rawMaterial: certificate.certificate };
    }
    return { kind: "self-managed", name, rawMaterial: certificate.certificate };
  }

  private async listTargetHttpsProxies(projectId: string, scope: string): Promise<TargetHttpsProxy[]> {
    const baseUrl = `${this.apiUrl}/projects/${encodeURIComponent(projectId)}/${scopePath(scope)}/targetHttpsProxies`;
    const proxies: TargetHttpsProxy[] = [];
    let pageToken: string | undefined;

    do {
      const url = pageToken ? `${baseUrl}?pageToken=${encodeURIComponent(pageToken)}` : baseUrl;
      const page = await this.request<TargetHttpsProxyList>(url, `${projectId}/${scope}/targetHttpsProxies`);

      for (const proxy of page.items ?? []) {
        if (!proxy.name) {
          throw new ControlPlaneError("Invalid target HTTPS proxy received", url, [
            { code: "INVALID_RESPONSE", message: "Proxy is missing its name" },
          ]);
        }
        proxies.push(proxy);
      }
      pageToken = page.nextPageToken;
    } while (pageToken);

    return proxies;
  }

  private async request<T>(url: string, target: string, signal?: AbortSignal): Promise<T> {
    const token = await this.options.credentials.getAccessToken();

    try {
      const response = await fetch(url, {
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${token}`,
        },
        signal: signal ?? AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        throw ControlPlaneError.fromHttpError(response, target);
      }

      return (await response.json()) as T;
    } catch (error) {
      if (error instanceof TrackerError) {
        throw error;
      }
      throw TransientError.fromError(error instanceof Error ? error : new Error(String(error)), target);
    }
  }
}
