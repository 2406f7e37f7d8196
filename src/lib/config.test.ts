import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

const PUBLIC_KEY = "ab".repeat(32);

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ PUBLIC_KEY, APPLICATION_ID: "1001" });

    expect(config).toEqual({
      port: 3000,
      publicKey: PUBLIC_KEY,
      applicationId: "1001",
      handlerConfigFile: null,
      autoDefer: { enabled: false, timeoutMs: 2000, ephemeral: false },
      followup: { apiBaseUrl: "https://discord.com/api/v10", maxRetries: 3 },
      botToken: null,
      commandSync: { onStartup: false, guildId: null },
    });
  });

  it("reads command sync settings and insists on a bot token for them", () => {
    const config = loadConfig({
      PUBLIC_KEY,
      APPLICATION_ID: "1001",
      BOT_TOKEN: "test-bot-token",
      SYNC_COMMANDS: "1",
      SYNC_GUILD_ID: "guild-7",
    });

    expect(config.botToken).toBe("test-bot-token");
    expect(config.commandSync).toEqual({ onStartup: true, guildId: "guild-7" });
    expect(() => loadConfig({ PUBLIC_KEY, APPLICATION_ID: "1001", SYNC_COMMANDS: "1" })).toThrow(
      "Missing required environment variable BOT_TOKEN (needed by SYNC_COMMANDS)",
    );
  });

  it("reads auto-defer settings and trims the API base url", () => {
    const config = loadConfig({
      PUBLIC_KEY,
      APPLICATION_ID: "1001",
      AUTO_DEFER: "1",
      AUTO_DEFER_TIMEOUT_MS: "0",
      AUTO_DEFER_EPHEMERAL: "true",
      API_BASE_URL: "http://127.0.0.1:9999/api/",
    });

    expect(config.autoDefer).toEqual({ enabled: true, timeoutMs: 0, ephemeral: true });
    expect(config.followup.apiBaseUrl).toBe("http://127.0.0.1:9999/api");
  });

  it("requires the public key and application id", () => {
    expect(() => loadConfig({ APPLICATION_ID: "1001" })).toThrow(
      "Missing required environment variable PUBLIC_KEY",
    );
    expect(() => loadConfig({ PUBLIC_KEY })).toThrow(
      "Missing required environment variable APPLICATION_ID",
    );
  });

  it("rejects malformed numbers and keys", () => {
    expect(() => loadConfig({ PUBLIC_KEY, APPLICATION_ID: "1", PORT: "abc" })).toThrow(
      "Invalid PORT value: abc",
    );
    expect(() => loadConfig({ PUBLIC_KEY: "xyz", APPLICATION_ID: "1" })).toThrow(
      "Invalid PUBLIC_KEY value: expected 32 bytes of hex",
    );
    expect(() => loadConfig({ PUBLIC_KEY, APPLICATION_ID: "1", AUTO_DEFER_TIMEOUT_MS: "3000000000" })).toThrow(
      "Invalid AUTO_DEFER_TIMEOUT_MS value: must not exceed 2147483647",
    );
  });
});
