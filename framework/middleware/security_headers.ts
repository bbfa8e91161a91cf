/**
 * Security Headers
 *
 * Adds clickjacking, MIME-sniffing and referrer protections to HTML
 * responses. JSON, event streams and other content types pass through
 * untouched.
 */

import type { HeaderPair } from '../errors.ts';
import { EventStreamResponse } from '../http/response.ts';
import type { Middleware } from '../http/types.ts';

export interface SecurityHeadersOptions {
  contentSecurityPolicy?: ContentSecurityPolicyOptions | false;
  strictTransportSecurity?: StrictTransportSecurityOptions | false;
  xContentTypeOptions?: boolean;
  xFrameOptions?: 'DENY' | 'SAMEORIGIN' | false;
  referrerPolicy?: ReferrerPolicy | false;
  permissionsPolicy?: PermissionsPolicyOptions | false;
}

export interface ContentSecurityPolicyOptions {
  defaultSrc?: string[];
  scriptSrc?: string[];
  styleSrc?: string[];
  imgSrc?: string[];
  fontSrc?: string[];
  connectSrc?: string[];
  mediaSrc?: string[];
  objectSrc?: string[];
  frameSrc?: string[];
  workerSrc?: string[];
  frameAncestors?: string[];
  formAction?: string[];
  baseUri?: string[];
  upgradeInsecureRequests?: boolean;
  reportUri?: string;
}

export interface StrictTransportSecurityOptions {
  maxAge?: number;
  includeSubDomains?: boolean;
  preload?: boolean;
}

export type PermissionsPolicyOptions = {
  accelerometer?: string[];
  camera?: string[];
  geolocation?: string[];
  microphone?: string[];
  payment?: string[];
  usb?: string[];
};

type ReferrerPolicy =
  | 'no-referrer'
  | 'no-referrer-when-downgrade'
  | 'origin'
  | 'origin-when-cross-origin'
  | 'same-origin'
  | 'strict-origin'
  | 'strict-origin-when-cross-origin'
  | 'unsafe-url';

type SourceListKey = {
  [K in keyof ContentSecurityPolicyOptions]-?: ContentSecurityPolicyOptions[K] extends
    | string[]
    | undefined
    ? K
    : never;
}[keyof ContentSecurityPolicyOptions];

const DIRECTIVES: ReadonlyArray<readonly [SourceListKey, string]> = [
  ['defaultSrc', 'default-src'],
  ['scriptSrc', 'script-src'],
  ['styleSrc', 'style-src'],
  ['imgSrc', 'img-src'],
  ['fontSrc', 'font-src'],
  ['connectSrc', 'connect-src'],
  ['mediaSrc', 'media-src'],
  ['objectSrc', 'object-src'],
  ['frameSrc', 'frame-src'],
  ['workerSrc', 'worker-src'],
  ['frameAncestors', 'frame-ancestors'],
  ['formAction', 'form-action'],
  ['baseUri', 'base-uri'],
];

const DEFAULT_OPTIONS: Required<SecurityHeadersOptions> = {
  contentSecurityPolicy: {
    defaultSrc: ["'self'"],
    objectSrc: ["'none'"],
    frameAncestors: ["'none'"],
    baseUri: ["'self'"],
  },
  strictTransportSecurity: false,
  xContentTypeOptions: true,
  xFrameOptions: 'DENY',
  referrerPolicy: 'strict-origin-when-cross-origin',
  permissionsPolicy: false,
};

/**
 * Build Content-Security-Policy header value
 */
export function buildCSP(options: ContentSecurityPolicyOptions): string {
  const directives: string[] = [];

  for (const [key, name] of DIRECTIVES) {
    const sources = options[key];
    if (sources) {
      directives.push(`${name} ${sources.join(' ')}`);
    }
  }
  if (options.upgradeInsecureRequests) {
    directives.push('upgrade-insecure-requests');
  }
  if (options.reportUri) {
    directives.push(`report-uri ${options.reportUri}`);
  }

  return directives.join('; ');
}

/**
 * Build Strict-Transport-Security header value
 */
function buildHSTS(options: StrictTransportSecurityOptions): string {
  let value = `max-age=${options.maxAge ?? 31536000}`;
  if (options.includeSubDomains) {
    value += '; includeSubDomains';
  }
  if (options.preload) {
    value += '; preload';
  }
  return value;
}

/**
 * Build Permissions-Policy header value
 */
function buildPermissionsPolicy(options: PermissionsPolicyOptions): string {
  const policies: string[] = [];

  for (const [key, value] of Object.entries(options)) {
    if (!value) continue;
    policies.push(`${key}=(${value.join(' ')})`);
  }

  return policies.join(', ');
}

/**
 * Security headers middleware
 */
export function securityHeaders(options: SecurityHeadersOptions = {}): Middleware {
  const config: Required<SecurityHeadersOptions> = { ...DEFAULT_OPTIONS, ...options };
  const headers: HeaderPair[] = [];

  if (config.xFrameOptions) {
    headers.push(['X-Frame-Options', config.xFrameOptions]);
  }
  if (config.xContentTypeOptions) {
    headers.push(['X-Content-Type-Options', 'nosniff']);
  }
  if (config.referrerPolicy) {
    headers.push(['Referrer-Policy', config.referrerPolicy]);
  }
  if (config.contentSecurityPolicy) {
    headers.push(['Content-Security-Policy', buildCSP(config.contentSecurityPolicy)]);
  }
  if (config.strictTransportSecurity) {
    headers.push(['Strict-Transport-Security', buildHSTS(config.strictTransportSecurity)]);
  }
  if (config.permissionsPolicy) {
    headers.push(['Permissions-Policy', buildPermissionsPolicy(config.permissionsPolicy)]);
  }

  return async function secure(req, next) {
    const response = await next(req);
    if (response instanceof EventStreamResponse || !response.contentType.startsWith('text/html')) {
      return response;
    }
    return response.withHeaders(headers);
  };
}
