import { describe, expect, it, vi } from "vitest";
import { DependencyFailureError } from "./errors.js";
import { GitHubClient } from "./github-client.js";

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

function stubFetch(respond: () => Response) {
  return vi.fn(async (..._args: FetchArgs) => respond());
}

function requestOf(fetchMock: ReturnType<typeof stubFetch>, call = 0) {
  const [input, init] = fetchMock.mock.calls[call];
  return {
    url: String(input),
    method: init?.method,
    headers: new Headers(init?.headers),
  };
}

describe("GitHubClient", () => {
  describe("listInstallations", () => {
    it("lists installations with the JWT as a bearer credential", async () => {
      const fetchMock = stubFetch(() => jsonResponse(200, [{ id: 42, app_id: 1 }, { id: 43 }]));
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      await expect(client.listInstallations("signed.jwt.value")).resolves.toEqual([{ id: 42, app_id: 1 }, { id: 43 }]);

      const request = requestOf(fetchMock);
      expect(request.url).toBe("https://api.github.com/app/installations");
      expect(request.method).toBe("GET");
      expect(request.headers.get("authorization")).toMatch(/^bearer signed\.jwt\.value$/i);
      expect(request.headers.get("accept")).toBe("application/vnd.github.v3+json");
    });

    it("targets the Enterprise Server API prefix", async () => {
      const fetchMock = stubFetch(() => jsonResponse(200, []));
      const client = new GitHubClient({ baseUrl: "https://ghe.example.com/api/v3", fetch: fetchMock });

      await expect(client.listInstallations("signed.jwt.value")).resolves.toEqual([]);
      expect(requestOf(fetchMock).url).toBe("https://ghe.example.com/api/v3/app/installations");
    });

    it("rejects a body that is not a list of installations", async () => {
      const fetchMock = stubFetch(() => jsonResponse(200, { message: "surprise" }));
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      await expect(client.listInstallations("signed.jwt.value")).rejects.toThrow(
        "listing failed: unexpected response from GitHub (expected a list of installations)",
      );
    });

    it("reports HTTP errors with the status code", async () => {
      const fetchMock = stubFetch(() => jsonResponse(401, { message: "Bad credentials" }));
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      const error = await client.listInstallations("signed.jwt.value").catch((e: unknown) => e);
      expect(error).toBeInstanceOf(DependencyFailureError);
      expect(error).toHaveProperty("step", "listing");
      expect(String(error)).toContain("GitHub responded with HTTP 401");
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("keeps the transport error as the cause", async () => {
      const fetchMock = vi.fn(async (..._args: FetchArgs): Promise<Response> => {
        throw new TypeError("fetch failed");
      });
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      const error = await client.listInstallations("signed.jwt.value").catch((e: unknown) => e);
      expect(error).toBeInstanceOf(DependencyFailureError);
      expect(String(error)).toContain("listing failed: request to GitHub failed");
      expect(error).toHaveProperty("cause");
    });
  });

  describe("createInstallationToken", () => {
    it("posts to the installation's access_tokens endpoint", async () => {
      const fetchMock = stubFetch(() =>
        jsonResponse(201, { token: "ghs_abc", expires_at: "2024-01-01T00:00:00Z", permissions: {} }),
      );
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      await expect(client.createInstallationToken("signed.jwt.value", 42)).resolves.toEqual({
        token: "ghs_abc",
        expires_at: "2024-01-01T00:00:00Z",
      });

      const request = requestOf(fetchMock);
      expect(request.url).toBe("https://api.github.com/app/installations/42/access_tokens");
      expect(request.method).toBe("POST");
      expect(request.headers.get("authorization")).toMatch(/^bearer signed\.jwt\.value$/i);
    });

    it("fails when the response carries no token", async () => {
      const fetchMock = stubFetch(() => jsonResponse(201, { expires_at: "2024-01-01T00:00:00Z" }));
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      await expect(client.createInstallationToken("signed.jwt.value", 42)).rejects.toThrow(
        "creating failed: failed to create app token",
      );
    });

    it("fails when the response carries no expiry", async () => {
      const fetchMock = stubFetch(() => jsonResponse(201, { token: "ghs_abc" }));
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      await expect(client.createInstallationToken("signed.jwt.value", 42)).rejects.toThrow(
        "creating failed: failed to create app token (response has no expires_at)",
      );
    });

    it("reports a missing installation as a dependency failure", async () => {
      const fetchMock = stubFetch(() => jsonResponse(404, { message: "Not Found" }));
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      await expect(client.createInstallationToken("signed.jwt.value", 7)).rejects.toThrow(
        "creating failed: GitHub responded with HTTP 404",
      );
    });
  });

  describe("revokeToken", () => {
    it("deletes the installation token using the token itself", async () => {
      const fetchMock = stubFetch(() => new Response(null, { status: 204 }));
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      await expect(client.revokeToken("ghs_abc")).resolves.toBe(204);

      const request = requestOf(fetchMock);
      expect(request.url).toBe("https://api.github.com/installation/token");
      expect(request.method).toBe("DELETE");
      expect(request.headers.get("authorization")).toBe("token ghs_abc");
    });

    it("returns the rejecting status instead of throwing", async () => {
      const fetchMock = stubFetch(() => jsonResponse(401, { message: "Bad credentials" }));
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      await expect(client.revokeToken("ghs_expired")).resolves.toBe(401);
    });

    it("throws on transport failure", async () => {
      const fetchMock = vi.fn(async (..._args: FetchArgs): Promise<Response> => {
        throw new TypeError("fetch failed");
      });
      const client = new GitHubClient({ baseUrl: "https://api.github.com", fetch: fetchMock });

      await expect(client.revokeToken("ghs_abc")).rejects.toThrow("revoking failed: request to GitHub failed");
    });
  });
});
