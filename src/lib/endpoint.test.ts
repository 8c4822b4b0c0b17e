import { describe, expect, it } from "vitest";
import { apiBaseUrl } from "./endpoint.js";
import { InvalidInputError } from "./errors.js";

describe("apiBaseUrl", () => {
  it("maps api.github.com to the public API", () => {
    expect(apiBaseUrl("api.github.com")).toBe("https://api.github.com");
    expect(apiBaseUrl()).toBe("https://api.github.com");
  });

  it("maps any other host to the Enterprise Server prefix", () => {
    expect(apiBaseUrl("github.example.com")).toBe("https://github.example.com/api/v3");
    expect(apiBaseUrl(" GHE.Example.com:8443 ")).toBe("https://ghe.example.com:8443/api/v3");
  });

  it("rejects hostnames carrying a scheme or path", () => {
    expect(() => apiBaseUrl("https://github.example.com")).toThrow(InvalidInputError);
    expect(() => apiBaseUrl("github.example.com/api")).toThrow(InvalidInputError);
    expect(() => apiBaseUrl("")).toThrow(InvalidInputError);
  });
});
