import { loadEnv } from "../../src/shared/config/env";

describe("loadEnv", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadEnv({})).toEqual({
      PORTAL_BASE_URL: "http://localhost:3999",
      SESSION_STATE_FILE: "state.json",
      STORES_FILE: "stores.csv",
      OUTPUT_DIR: "output",
      FORM_POST_URL: undefined,
      FORM_FIELD_MAP_FILE: "config/form-fields.json",
      CHAT_WEBHOOK_URL: undefined,
      PERFORMANCE_WEBHOOK_URL: undefined,
      CHAT_STORE_PREFIX: "",
      MONGO_URI: undefined,
      HARVEST_TIMEZONE: "Europe/London",
      STATUS_PORT: undefined
    });
  });

  it("sends highlights to the chat webhook unless a separate one is set", () => {
    expect(loadEnv({ CHAT_WEBHOOK_URL: "https://chat.example.test/hook" }).PERFORMANCE_WEBHOOK_URL).toBe(
      "https://chat.example.test/hook"
    );
    expect(
      loadEnv({
        CHAT_WEBHOOK_URL: "https://chat.example.test/hook",
        PERFORMANCE_WEBHOOK_URL: "https://chat.example.test/perf"
      }).PERFORMANCE_WEBHOOK_URL
    ).toBe("https://chat.example.test/perf");
  });

  it("treats blank optional values as unset", () => {
    const env = loadEnv({ MONGO_URI: "  ", FORM_POST_URL: "", STATUS_PORT: " " });
    expect(env.MONGO_URI).toBeUndefined();
    expect(env.FORM_POST_URL).toBeUndefined();
    expect(env.STATUS_PORT).toBeUndefined();
  });

  it("rejects non-absolute portal URLs", () => {
    expect(() => loadEnv({ PORTAL_BASE_URL: "/snowdash" })).toThrow(
      "PORTAL_BASE_URL must be a valid absolute http/https URL. Received: /snowdash"
    );
  });

  it("rejects unsupported URL schemes", () => {
    expect(() => loadEnv({ FORM_POST_URL: "ftp://forms.example.test" })).toThrow(
      "FORM_POST_URL must use http or https scheme. Received: ftp://forms.example.test"
    );
  });

  it("rejects unknown time zones and out-of-range ports", () => {
    expect(() => loadEnv({ HARVEST_TIMEZONE: "Mars/Olympus" })).toThrow(
      "HARVEST_TIMEZONE must be an IANA time zone. Received: Mars/Olympus"
    );
    expect(() => loadEnv({ STATUS_PORT: "70000" })).toThrow("STATUS_PORT=70000 is out of allowed range [0..65535]");
  });
});
