/**
 * Static Files Middleware
 *
 * Serves files from a directory for request paths under a URL prefix.
 * Anything else, including a missing file, falls through to the next
 * handler.
 */

import { readFile, realpath, stat } from 'node:fs/promises';
import { extname, resolve, sep } from 'node:path';
import { HttpResponse, text } from '../http/response.ts';
import type { Middleware } from '../http/types.ts';

export interface StaticFilesOptions {
  directory: string;
  /** URL prefix, default "/static" */
  prefix?: string;
  /** Cache-Control value sent with every file */
  cacheControl?: string;
}

/**
 * Common MIME types
 */
const MIME_TYPES: Readonly<Record<string, string>> = {
  html: 'text/html; charset=utf-8',
  htm: 'text/html; charset=utf-8',
  css: 'text/css; charset=utf-8',
  js: 'application/javascript; charset=utf-8',
  mjs: 'application/javascript; charset=utf-8',
  json: 'application/json; charset=utf-8',
  xml: 'application/xml; charset=utf-8',
  txt: 'text/plain; charset=utf-8',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
  webp: 'image/webp',
  ico: 'image/x-icon',
  woff: 'font/woff',
  woff2: 'font/woff2',
  ttf: 'font/ttf',
  otf: 'font/otf',
  pdf: 'application/pdf',
  zip: 'application/zip',
};

export function contentTypeFor(path: string): string {
  const ext = extname(path).slice(1).toLowerCase();
  return Object.hasOwn(MIME_TYPES, ext) ? MIME_TYPES[ext] : 'application/octet-stream';
}

function isInside(root: string, path: string): boolean {
  return path === root || path.startsWith(root.endsWith(sep) ? root : root + sep);
}

function forbidden(): HttpResponse {
  return text('Forbidden', 403);
}

/**
 * Create static file middleware
 *
 * ```ts
 * app.use(staticFiles({ directory: './public', prefix: '/assets' }));
 * ```
 */
export function staticFiles(options: StaticFilesOptions): Middleware {
  // "/assets/" and "assets" both mean "/assets"; "/" serves from the root
  const trimmed = (options.prefix ?? '/static').replace(/^\/+|\/+$/g, '');
  const base = trimmed ? `/${trimmed}` : '';
  const cacheControl = options.cacheControl ?? 'public, max-age=3600';
  const directory = resolve(options.directory);

  // Symlinks in the configured directory itself are resolved once
  let root: Promise<string | null> | null = null;
  const resolveRoot = (): Promise<string | null> => {
    root ??= realpath(directory).catch(() => null);
    return root;
  };

  return async function serveStatic(req, next) {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      return await next(req);
    }

    if (req.path !== base && !req.path.startsWith(base + '/')) {
      return await next(req);
    }

    let relative: string;
    try {
      relative = decodeURIComponent(req.path.slice(base.length)).replace(/^\/+/, '');
    } catch {
      return await next(req);
    }
    if (!relative) {
      return await next(req);
    }
    if (relative.includes('\0') || !isInside(directory, resolve(directory, relative))) {
      return forbidden();
    }

    const rootPath = await resolveRoot();
    if (rootPath === null) {
      return await next(req);
    }

    let filePath: string;
    try {
      filePath = await realpath(resolve(rootPath, relative));
    } catch {
      return await next(req);
    }
    // A symlink inside the directory may still point outside it
    if (!isInside(rootPath, filePath)) {
      return forbidden();
    }

    const info = await stat(filePath);
    if (!info.isFile()) {
      return await next(req);
    }

    const body = await readFile(filePath);
    return new HttpResponse({
      body,
      contentType: contentTypeFor(filePath),
      headers: [['Cache-Control', cacheControl]],
    });
  };
}
