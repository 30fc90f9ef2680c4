import { request, type Dispatcher } from "undici";
import type { z } from "zod";
import { HttpError } from "../../errors";
import type { ChannelLogger } from "../../logging";
import type { Token } from "../types";
import { ErrorEnvelopeSchema } from "./schemas";

export interface TokenSource {
  getToken(tenantId: string, scope: string): Promise<Token>;
}

export interface AzureRestClientOptions {
  dispatcher?: Dispatcher;
  logger: ChannelLogger;
}

export interface RestCall {
  method?: Dispatcher.HttpMethod;
  url: string;
  tenantId: string;
  scope: string;
  body?: unknown;
}

/** Thin bearer-authenticated JSON client for ARM and Key Vault data-plane calls. */
export class AzureRestClient {
  private readonly dispatcher?: Dispatcher;
  private readonly log: ChannelLogger;

  constructor(
    private readonly tokens: TokenSource,
    options: AzureRestClientOptions
  ) {
    this.dispatcher = options.dispatcher;
    this.log = options.logger;
  }

  async send(call: RestCall): Promise<unknown> {
    const method = call.method ?? "GET";
    const token = await this.tokens.getToken(call.tenantId, call.scope);
    const headers: Record<string, string> = {
      authorization: `Bearer ${token.accessToken}`,
      accept: "application/json",
    };
    let body: string | undefined;
    if (call.body !== undefined) {
      headers["content-type"] = "application/json";
      body = JSON.stringify(call.body);
    }

    this.log.debug("request", { method, url: call.url });
    const res = await request(call.url, {
      method,
      headers,
      body,
      dispatcher: this.dispatcher,
    });
    const text = await res.body.text();

    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw new HttpError(res.statusCode, errorMessage(res.statusCode, text));
    }
    if (!text) return undefined;
    try {
      return JSON.parse(text);
    } catch {
      throw new Error(`${method} ${call.url} returned invalid JSON`);
    }
  }

  async json<T>(call: RestCall, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const payload = await this.send(call);
    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new Error(
        `${call.method ?? "GET"} ${call.url} returned an unexpected shape: ${result.error.issues[0]?.message ?? "invalid"}`
      );
    }
    return result.data;
  }

  /** Follow `nextLink` until the listing is exhausted. */
  async listAll<T>(
    call: RestCall,
    page: z.ZodType<{ value: T[]; nextLink?: string | null }, z.ZodTypeDef, unknown>
  ): Promise<T[]> {
    const items: T[] = [];
    let url: string | null | undefined = call.url;
    while (url) {
      const result: { value: T[]; nextLink?: string | null } = await this.json({ ...call, url }, page);
      items.push(...result.value);
      url = result.nextLink;
    }
    return items;
  }
}

function errorMessage(status: number, text: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text.trim() || `HTTP ${status}`;
  }
  const envelope = ErrorEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) return `HTTP ${status}`;
  const { code, message } = envelope.data.error;
  if (code && message) return `${code}: ${message}`;
  return message ?? code ?? `HTTP ${status}`;
}
