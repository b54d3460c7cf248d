/**
 * Unauthenticated root routes: landing page and liveness ping
 */

import { Hono } from 'hono';
import { okResponse } from './helpers.js';

const ENDPOINTS: ReadonlyArray<readonly [method: string, path: string, summary: string]> = [
  ['POST', '/v1/save', 'Encrypt and store a memory'],
  ['GET', '/v1/list/{owner_id}', 'List memory metadata for an owner'],
  ['GET', '/v1/download/{id}', 'Decrypt one memory'],
  ['DELETE', '/v1/delete/{id}', 'Delete one memory'],
  ['POST', '/v1/query/{owner_id}', 'Search by emotion or keyword'],
];

const LANDING_PAGE = `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>MemVault</title>
  </head>
  <body>
    <h1>MemVault</h1>
    <p>Encrypted memory store. Every <code>/v1</code> route needs an <code>X-API-Key</code> header.</p>
    <ul>
${ENDPOINTS.map(([method, path, summary]) => `      <li><code>${method} ${path}</code> ${summary}</li>`).join('\n')}
    </ul>
  </body>
</html>
`;

export const rootRoutes = new Hono();

rootRoutes.get('/', (c) => c.html(LANDING_PAGE));

rootRoutes.get('/ping', (c) => okResponse(c, { message: 'MemVault is alive' }));
