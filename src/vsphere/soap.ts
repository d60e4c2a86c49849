import https from 'https';
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import xml2js from 'xml2js';
import { VSphereFaultError } from './errors.js';
import type { MoRef, TlsPolicy } from './types.js';

const SOAP_ENV_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
const XSI_NS = 'http://www.w3.org/2001/XMLSchema-instance';
const XSD_NS = 'http://www.w3.org/2001/XMLSchema';
const VIM25_NS = 'urn:vim25';

export const DEFAULT_API_VERSION = '6.7.3';
const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/**
 * Object shape accepted by the xml2js builder: `$` holds attributes,
 * `_` holds text, arrays become repeated elements.
 */
export type XmlValue = string | XmlElement | XmlValue[];

export interface XmlElement {
  $?: Record<string, string>;
  _?: string;
  [child: string]: XmlValue | Record<string, string> | undefined;
}

export interface SoapTransportOptions {
  host: string;
  tlsPolicy: TlsPolicy;
  apiVersion?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
  trace?: (line: string) => void;
}

const builder = new xml2js.Builder({
  renderOpts: { pretty: false },
  xmldec: { version: '1.0', encoding: 'UTF-8' },
});

export function moRefNode(ref: MoRef): XmlElement {
  return { $: { type: ref.type }, _: ref.value };
}

/**
 * Element carrying an explicit `xsi:type`, needed where vim25 expects a
 * subtype (e.g. a TraversalSpec inside a selectSet).
 */
export function typedNode(xsiType: string, fields: XmlElement): XmlElement {
  return { $: { 'xsi:type': xsiType }, ...fields };
}

export function buildEnvelope(method: string, target: MoRef, args: XmlElement = {}): string {
  return builder.buildObject({
    'soapenv:Envelope': {
      $: { 'xmlns:soapenv': SOAP_ENV_NS, 'xmlns:xsi': XSI_NS, 'xmlns:xsd': XSD_NS },
      'soapenv:Body': {
        [method]: { $: { xmlns: VIM25_NS }, _this: moRefNode(target), ...args },
      },
    },
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function child(node: unknown, key: string): unknown {
  return isRecord(node) ? node[key] : undefined;
}

/**
 * Text content of a parsed element, whether xml2js collapsed it to a string
 * or kept it as `{ _: text, $: attrs }`.
 */
export function text(node: unknown): string | undefined {
  if (typeof node === 'string') {
    return node;
  }
  const inner = child(node, '_');
  return typeof inner === 'string' ? inner : undefined;
}

export function attr(node: unknown, name: string): string | undefined {
  const value = child(child(node, '$'), name);
  return typeof value === 'string' ? value : undefined;
}

export function asArray(node: unknown): unknown[] {
  if (node === undefined || node === '') {
    return [];
  }
  return Array.isArray(node) ? node : [node];
}

export function parseMoRef(node: unknown): MoRef | undefined {
  const value = text(node);
  const type = attr(node, 'type');
  if (value === undefined || type === undefined) {
    return undefined;
  }
  return { type, value };
}

export async function parseSoapBody(xml: string): Promise<unknown> {
  const doc: unknown = await xml2js.parseStringPromise(xml, {
    explicitArray: false,
    tagNameProcessors: [xml2js.processors.stripPrefix],
  });
  return child(child(doc, 'Envelope'), 'Body');
}

function faultError(method: string, fault: unknown): VSphereFaultError {
  const faultString = text(child(fault, 'faultstring')) ?? 'Unknown SOAP fault';
  let faultType = text(child(fault, 'faultcode')) ?? 'ServerFaultCode';

  const detail = child(fault, 'detail');
  if (isRecord(detail)) {
    const key = Object.keys(detail).find((name) => name !== '$');
    if (key) {
      faultType = attr(detail[key], 'xsi:type') ?? key;
    }
  }

  return new VSphereFaultError(method, faultType, faultString);
}

/**
 * Posts vim25 SOAP envelopes to `https://<host>/sdk` and replays the
 * session cookie vCenter hands out.
 */
export class SoapTransport {
  private readonly http: AxiosInstance;
  private cookie: string | null = null;

  constructor(private readonly options: SoapTransportOptions) {
    this.http = axios.create({
      baseURL: `https://${options.host}`,
      timeout: options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      httpsAgent: new https.Agent({
        rejectUnauthorized: options.tlsPolicy === 'verify',
      }),
      headers: {
        'Content-Type': 'text/xml; charset=utf-8',
        SOAPAction: `urn:vim25/${options.apiVersion ?? DEFAULT_API_VERSION}`,
      },
      responseType: 'text',
      // Faults arrive as HTTP 500 with a SOAP body; status is checked below.
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  get host(): string {
    return this.options.host;
  }

  async call(method: string, target: MoRef, args: XmlElement = {}): Promise<unknown> {
    this.options.trace?.(`SOAP ${method} ${target.type}:${target.value}`);

    const headers: Record<string, string> = {};
    if (this.cookie) {
      headers.Cookie = this.cookie;
    }

    const response = await this.http.post<string>('/sdk', buildEnvelope(method, target, args), { headers });
    this.captureCookie(response.headers['set-cookie']);

    let body: unknown;
    try {
      body = await parseSoapBody(String(response.data));
    } catch {
      throw new Error(`${method} failed with HTTP ${response.status}: response is not a SOAP envelope`);
    }

    const fault = child(body, 'Fault');
    if (fault !== undefined) {
      throw faultError(method, fault);
    }
    if (response.status >= 400) {
      throw new Error(`${method} failed with HTTP ${response.status}`);
    }

    return child(child(body, `${method}Response`), 'returnval');
  }

  private captureCookie(setCookie: unknown): void {
    if (!Array.isArray(setCookie)) {
      return;
    }
    const pairs = setCookie
      .filter((value): value is string => typeof value === 'string')
      .map((value) => value.split(';')[0].trim())
      .filter((pair) => pair.length > 0);
    if (pairs.length > 0) {
      this.cookie = pairs.join('; ');
    }
  }
}
