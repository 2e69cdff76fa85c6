/**
 * Test helpers and fixtures shared by the schema, contract and virtual
 * integration suites.
 *
 * Provides schema fixtures, sample arguments, an in-memory transport and
 * builders for the HTTP responses a stubbed `fetch` returns.
 */

import * as path from "path";
import type { Transport } from "../clients/transport";
import type { Backend, RequestPayload } from "../schemas/field-spec";
import { SchemaIndex, loadSchemaSources } from "../schemas/schema-index";

// ── Schema Fixtures ─────────────────────────────────────────────────────────

export const FIXTURE_SCHEMA_DIR = path.resolve(__dirname, "../../schemas");

/** A fresh index with the stored fixture versions of one backend loaded. */
export async function loadFixtureIndex(
  backend: Backend,
  ...versions: string[]
): Promise<SchemaIndex> {
  const index = new SchemaIndex(backend);
  for (const version of versions) {
    index.load(await loadSchemaSources(backend, version, FIXTURE_SCHEMA_DIR), version);
  }
  return index;
}

/** Minimal AXL 14.0 `addPhone` arguments; overrides replace `phone` fields. */
export function createSamplePhoneArgs(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    phone: {
      name: "SEP001122334455",
      model: "7841",
      ...overrides,
    },
  };
}

export function createSampleLine(index: number, pattern: string): Record<string, unknown> {
  return { index, dirn: { pattern } };
}

// ── Fake Transport ──────────────────────────────────────────────────────────

export interface RecordedCall {
  operation: string;
  apiVersion: string;
  payload: RequestPayload;
}

/**
 * Transport that records every call and answers from a queue of raw
 * responses (or errors) instead of a server.
 */
export class FakeTransport implements Transport {
  readonly calls: RecordedCall[] = [];
  private readonly replies: Array<{ value: unknown } | { error: Error }> = [];

  reply(value: unknown): this {
    this.replies.push({ value });
    return this;
  }

  fail(error: Error): this {
    this.replies.push({ error });
    return this;
  }

  async send(operation: string, apiVersion: string, payload: RequestPayload): Promise<unknown> {
    this.calls.push({ operation, apiVersion, payload });
    const next = this.replies.shift();
    if (!next) return {};
    if ("error" in next) throw next.error;
    return next.value;
  }
}

// ── HTTP Response Builders ──────────────────────────────────────────────────

export function soapEnvelope(body: string): string {
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    '<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/">' +
    `<soapenv:Body>${body}</soapenv:Body>` +
    "</soapenv:Envelope>"
  );
}

export function soapFault(faultString: string, axlCode?: number): string {
  const detail =
    axlCode === undefined
      ? ""
      : `<detail><axlError><axlcode>${axlCode}</axlcode><axlmessage>${faultString}</axlmessage></axlError></detail>`;
  return soapEnvelope(
    `<soapenv:Fault><faultcode>soapenv:Server</faultcode><faultstring>${faultString}</faultstring>${detail}</soapenv:Fault>`
  );
}

export function xmlResponse(body: string, status: number = 200): Response {
  return new Response(body, { status, headers: { "Content-Type": "text/xml; charset=utf-8" } });
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function textResponse(body: string, status: number = 200): Response {
  return new Response(body, { status, headers: { "Content-Type": "text/html" } });
}

/** Header value of the request a `fetch` mock received. */
export function requestHeader(init: RequestInit | undefined, name: string): string | undefined {
  return new Headers(init?.headers).get(name) ?? undefined;
}

// ── Assertion Helpers ───────────────────────────────────────────────────────

/** The error `fn` throws; fails the test when it returns normally. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected an error to be thrown");
}

export async function catchAsyncError(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the promise to reject");
}
