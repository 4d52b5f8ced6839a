import { loadSettings } from "../src/config/settings";

describe("Settings Suite", () => {
  it("should apply defaults for an empty environment", () => {
    const settings = loadSettings({});
    expect(settings.port).toBe(8000);
    expect(settings.jwtSecret).toBe("dev-secret");
    expect(settings.jwtAlgorithm).toBe("HS256");
    expect(settings.accessTokenExpireMinutes).toBe(480);
    expect(settings.storageRoot).toBe("./storage");
    expect(settings.debug).toBe(false);
    expect(settings.adminUsername).toBeUndefined();
  });

  it("should read overrides from the environment", () => {
    const settings = loadSettings({
      PORT: "9100",
      JWT_SECRET: "test-secret",
      JWT_ALG: "HS512",
      ACCESS_TOKEN_EXPIRE_MINUTES: "15",
      STORAGE_ROOT: "/tmp/medimg",
      DEBUG: "true",
      ADMIN_USERNAME: "root",
      ADMIN_PASSWORD: "test-password"
    });
    expect(settings.port).toBe(9100);
    expect(settings.jwtSecret).toBe("test-secret");
    expect(settings.jwtAlgorithm).toBe("HS512");
    expect(settings.accessTokenExpireMinutes).toBe(15);
    expect(settings.storageRoot).toBe("/tmp/medimg");
    expect(settings.debug).toBe(true);
    expect(settings.adminUsername).toBe("root");
  });

  it("should refuse a non-numeric port", () => {
    expect(() => loadSettings({ PORT: "eighty" })).toThrow("PORT must be a positive integer");
  });

  it("should refuse an asymmetric signing algorithm", () => {
    expect(() => loadSettings({ JWT_ALG: "RS256" })).toThrow("JWT_ALG \"RS256\" is not a supported signing algorithm");
  });
});
