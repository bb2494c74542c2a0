import { readFile } from "node:fs/promises";
import type { PortalCookie, PortalSession, SessionProvider } from "../../ports/SessionProvider";
import { logEvent } from "../../shared/logging/logEvent";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toCookie = (value: unknown): PortalCookie | undefined => {
  if (!isRecord(value)) return undefined;
  const { name, value: cookieValue, domain } = value;
  if (typeof name !== "string" || name === "" || typeof cookieValue !== "string") return undefined;
  return { name, value: cookieValue, domain: typeof domain === "string" ? domain : "" };
};

export const cookieMatchesHost = (cookie: PortalCookie, host: string): boolean => {
  const domain = cookie.domain.replace(/^\./, "").toLowerCase();
  if (domain === "") return true;
  const normalizedHost = host.toLowerCase();
  return normalizedHost === domain || normalizedHost.endsWith(`.${domain}`);
};

/**
 * Reuses a browser storage-state export (`{ "cookies": [...] }`) saved by an
 * earlier interactive login. Interactive login itself happens elsewhere.
 */
export class StorageStateSessionProvider implements SessionProvider {
  constructor(
    private readonly stateFile: string,
    private readonly portalBaseUrl: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async ensureSession(): Promise<PortalSession> {
    let text: string;
    try {
      text = await readFile(this.stateFile, "utf8");
    } catch (err) {
      throw new Error(`Session state file ${this.stateFile} could not be read`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new Error(`Session state file ${this.stateFile} is not valid JSON`, { cause: err });
    }

    const rawCookies = isRecord(parsed) ? parsed.cookies : undefined;
    if (!Array.isArray(rawCookies)) {
      throw new Error(`Session state file ${this.stateFile} has no cookies array`);
    }

    const host = new URL(this.portalBaseUrl).hostname;
    const cookies = rawCookies
      .map(toCookie)
      .filter((cookie): cookie is PortalCookie => cookie !== undefined)
      .filter((cookie) => cookieMatchesHost(cookie, host));

    if (cookies.length === 0) {
      throw new Error(`Session state file ${this.stateFile} has no cookies for ${host}`);
    }

    logEvent("info", "session.loaded", { cookies: cookies.length, host });
    return { cookies, establishedAt: this.now() };
  }
}
