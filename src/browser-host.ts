export type HttpMethod = "GET" | "POST" | "PATCH";

export type DomNode = {
  innerText(): string;
  innerHtml(): string;
};

export type HostRequestOptions = {
  headers?: Record<string, string>;
  /** Serialized as JSON. */
  body?: unknown;
  params?: Record<string, string | number>;
};

export type HostResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  headers: Record<string, string>;
  text(): string;
  /** Throws when the body is not JSON. */
  json(): unknown;
};

/**
 * What the bridge needs from a browser that is logged in to the chat site.
 * Every call runs against the same page.
 */
export interface BrowserHost {
  navigate(url: string): Promise<void>;
  evaluate(script: string): Promise<unknown>;
  queryDom(selector: string): Promise<DomNode[]>;
  removeNode(id: string): Promise<void>;
  httpRequest(method: HttpMethod, url: string, options?: HostRequestOptions): Promise<HostResponse>;
  close(): Promise<void>;
}

export function withQuery(url: string, params: Record<string, string | number> | undefined): string {
  if (!params || Object.keys(params).length === 0) {
    return url;
  }

  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, String(value));
  }

  return target.toString();
}

export function createHostResponse(input: {
  ok: boolean;
  status: number;
  statusText?: string;
  headers?: Record<string, string>;
  text: string;
}): HostResponse {
  const { text } = input;
  return {
    ok: input.ok,
    status: input.status,
    statusText: input.statusText ?? "",
    headers: input.headers ?? {},
    text: () => text,
    json: (): unknown => JSON.parse(text),
  };
}
