export type PortalCookie = {
  name: string;
  value: string;
  domain: string;
};

export type PortalSession = {
  cookies: PortalCookie[];
  establishedAt: Date;
};

export interface SessionProvider {
  /** Resolves an authenticated session or throws; the run aborts on failure. */
  ensureSession(): Promise<PortalSession>;
}
