import { Agent, fetch as undiciFetch } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpRequestInit {
  method: "GET";
  headers: Record<string, string>;
  signal: AbortSignal;
  redirect: "follow";
  dispatcher?: Agent;
}

/** The slice of a fetch Response the harvester reads. */
export interface HttpResponse {
  status: number;
  ok: boolean;
  url: string;
  headers: { get(name: string): string | null };
  body?: { cancel(): Promise<void> } | null;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export const defaultHttpFetch: HttpFetch = (url, init) => undiciFetch(url, init);
