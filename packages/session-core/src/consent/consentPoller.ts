/**
 * Obtains per-service consent for end-to-end protected data.  The account's trusted device has to
 * approve once and then upload cookies for the service; both steps are polled with a bounded
 * number of attempts and an injectable sleep.
 */
import type { ConsentRequest } from "../auth/types";
import { SessionError } from "../errors";
import type { AccountSession } from "../http/accountSession";
import { isRecord, readString } from "../json";
import type { Logger } from "../logger";

export const PENDING_CONSENT_MESSAGES: ReadonlyArray<string> = [
  "Requested the device to upload cookies.",
  "Cookies not available yet on server."
];

export interface ConsentPollerOptions {
  readonly logger: Logger;
  readonly maxAttempts?: number;
  readonly intervalMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
}

interface WebAccessState {
  readonly isICDRSDisabled: boolean;
  readonly isDeviceConsentedForPCS: boolean;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class ConsentPoller {
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly intervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ConsentPollerOptions) {
    this.logger = options.logger;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 10);
    this.intervalMs = options.intervalMs ?? 5_000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async ensureConsent(session: AccountSession, serviceName: string): Promise<void> {
    const accessState = await this.fetchAccessState(session);
    if (!accessState.isICDRSDisabled) {
      this.logger.warn("Data recovery service is enabled; no consent needed", { serviceName });
      return;
    }
    if (!accessState.isDeviceConsentedForPCS) {
      await this.requestDeviceConsent(session);
    }
    await this.requestServiceCookies(session, serviceName);
  }

  private async fetchAccessState(session: AccountSession): Promise<WebAccessState> {
    const response = await session.request(`${session.endpoints.setup}/requestWebAccessState`, {
      method: "POST",
      params: session.params()
    });
    const body = response.data;
    return {
      isICDRSDisabled: isRecord(body) && body.isICDRSDisabled === true,
      isDeviceConsentedForPCS: isRecord(body) && body.isDeviceConsentedForPCS === true
    };
  }

  private async requestDeviceConsent(session: AccountSession): Promise<void> {
    const response = await session.request(`${session.endpoints.setup}/enableDeviceConsentForPCS`, {
      method: "POST",
      params: session.params()
    });
    const body = response.data;
    if (!isRecord(body) || body.isDeviceConsentNotificationSent !== true) {
      throw new SessionError("unknown", "Unable to request access to protected data", { payload: body });
    }

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      this.logger.debug("Waiting for device consent", { attempt });
      await this.sleep(this.intervalMs);
      const accessState = await this.fetchAccessState(session);
      if (accessState.isDeviceConsentedForPCS) {
        return;
      }
    }
    throw new SessionError("consent_timeout", `Device consent was not granted after ${this.maxAttempts} attempts`);
  }

  private async requestServiceCookies(session: AccountSession, serviceName: string): Promise<void> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const request: ConsentRequest = { serviceName, derivedFromUserAction: attempt === 1, attempt };
      const response = await session.request(`${session.endpoints.setup}/requestPCS`, {
        method: "POST",
        params: session.params(),
        json: { appName: request.serviceName, derivedFromUserAction: request.derivedFromUserAction }
      });
      const body: Record<string, unknown> = isRecord(response.data) ? response.data : {};
      if (body.status === "success") {
        this.logger.debug("Service consent granted", { serviceName, attempt });
        return;
      }

      const message = readString(body, "message") ?? "";
      if (!PENDING_CONSENT_MESSAGES.includes(message)) {
        this.logger.error("Service consent failed", { serviceName, message });
        throw new SessionError("unknown", `Unable to obtain consent for ${serviceName}: ${message || "no reason given"}`, {
          payload: response.data
        });
      }
      this.logger.debug("Service consent pending", { ...request, message });
      if (attempt < this.maxAttempts) {
        await this.sleep(this.intervalMs);
      }
    }
    throw new SessionError("consent_timeout", `Consent for ${serviceName} was not granted after ${this.maxAttempts} attempts`);
  }
}
