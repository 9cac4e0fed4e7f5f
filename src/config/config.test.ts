import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "./config";

describe("loadConfig", () => {
  it("should fall back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      markerAS: 23456,
      prefix: "1.1.1.0/24",
      templatePath: "/etc/bird/conf.orig",
      configPath: "/etc/bird/bird.conf",
      socketPath: "/run/bird/bird.ctl",
      placeholder: "###COMMUNITY###",
      debug: false,
    });
  });

  it("should treat empty values as unset", () => {
    expect(loadConfig({ COMMUNITY_ASN: "", PEER_PREFIX: "", DEBUG: "" })).toEqual(DEFAULT_CONFIG);
  });

  it("should read every variable", () => {
    const config = loadConfig({
      COMMUNITY_ASN: "65000",
      PEER_PREFIX: "2001:db8::/48",
      BIRD_TEMPLATE_FILE: "/tmp/conf.orig",
      BIRD_CONF_FILE: "/tmp/bird.conf",
      BIRD_SOCKET: "/tmp/bird.ctl",
      BIRD_PLACEHOLDER: "@@",
      DEBUG: "YES",
    });

    expect(config).toEqual({
      markerAS: 65000,
      prefix: "2001:db8::/48",
      templatePath: "/tmp/conf.orig",
      configPath: "/tmp/bird.conf",
      socketPath: "/tmp/bird.ctl",
      placeholder: "@@",
      debug: true,
    });
  });

  it("should reject a marker AS outside 16 bits", () => {
    expect(() => loadConfig({ COMMUNITY_ASN: "65536" })).toThrow(
      'COMMUNITY_ASN must be an integer between 0 and 65535, got "65536"'
    );
    expect(() => loadConfig({ COMMUNITY_ASN: "12ab" })).toThrow(
      'COMMUNITY_ASN must be an integer between 0 and 65535, got "12ab"'
    );
  });

  it("should reject a prefix that is not CIDR", () => {
    expect(() => loadConfig({ PEER_PREFIX: "1.1.1.0" })).toThrow(
      'PEER_PREFIX must be a CIDR prefix, got "1.1.1.0"'
    );
  });

  it("should reject an unknown debug flag", () => {
    expect(() => loadConfig({ DEBUG: "maybe" })).toThrow('DEBUG must be a boolean, got "maybe"');
    expect(loadConfig({ DEBUG: "0" }).debug).toBe(false);
  });
});
