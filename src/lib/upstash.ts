import fetch from "node-fetch";

export type UpstashConfig = {
  url: string;
  token: string;
};

/**
 * Minimal Upstash Redis REST client: one command per POST, arguments as
 * path segments. Resolves with the command's `result`.
 */
export interface UpstashClient {
  call(...parts: string[]): Promise<unknown>;
}

export function isUpstashConfigured(config: Partial<UpstashConfig> | undefined): config is UpstashConfig {
  return Boolean(config?.url && config?.token);
}

export function createUpstashClient(config: UpstashConfig): UpstashClient {
  const base = config.url.replace(/\/$/, "");

  return {
    async call(...parts: string[]) {
      const encoded = parts.map((p) => encodeURIComponent(p));
      const url = `${base}/${encoded.join("/")}`;

      const res = await fetch(url, {
        method: "POST",
        headers: { Authorization: `Bearer ${config.token}` },
      });

      if (!res.ok) {
        const text = await res.text();
        throw new Error(`Redis error ${res.status}: ${text}`);
      }

      const body: unknown = await res.json();
      if (body && typeof body === "object" && "result" in body) {
        return body.result;
      }
      return null;
    },
  };
}

export function resultString(result: unknown): string | null {
  return typeof result === "string" ? result : null;
}

export function resultList(result: unknown): Array<string | null> {
  if (!Array.isArray(result)) return [];
  return result.map((item) => (typeof item === "string" ? item : null));
}
