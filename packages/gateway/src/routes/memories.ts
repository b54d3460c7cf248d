/**
 * Memories Routes
 *
 * Encrypted memory store API. All business logic is delegated to the
 * registered IMemoryService; handlers only validate and reshape.
 */

import { Hono } from 'hono';
import {
  getServiceRegistry,
  Services,
  type MemoryMatch,
  type MemoryQueryFilter,
  type MemorySummary,
} from '@memvault/core';
import type { MemoryItemBody, MemoryMatchBody } from '../types/index.js';
import { queryMemorySchema, saveMemorySchema, validateBody } from '../middleware/validation.js';
import { okResponse, readJsonBody } from './helpers.js';

export const SKIPPED_RECORDS_HEADER = 'X-Skipped-Records';

export const memoriesRoutes = new Hono();

function toItemBody(item: MemorySummary): MemoryItemBody {
  return {
    id: item.id,
    key: item.key,
    tags: item.tags,
    created_at: item.createdAt,
    updated_at: item.updatedAt,
    version: item.version,
  };
}

function toMatchBody(match: MemoryMatch): MemoryMatchBody {
  return {
    id: match.id,
    key: match.key,
    tags: match.tags,
    created_at: match.createdAt,
    text: match.text,
  };
}

/**
 * POST /save - Tag, encrypt and store one memory
 */
memoriesRoutes.post('/save', async (c) => {
  const body = validateBody(saveMemorySchema, await readJsonBody(c));

  const service = getServiceRegistry().get(Services.Memory);
  const record = await service.save({
    ownerId: body.owner_id,
    key: body.key ?? undefined,
    tags: body.tags ?? undefined,
    data: body.data,
  });

  return okResponse(c, { id: record.id, tags: record.tags });
});

/**
 * GET /list/:owner_id - Metadata of the owner's memories, oldest first
 */
memoriesRoutes.get('/list/:owner_id', async (c) => {
  const service = getServiceRegistry().get(Services.Memory);
  const items = await service.list(c.req.param('owner_id'));

  return okResponse(c, { items: items.map(toItemBody) });
});

/**
 * GET /download/:id - Decrypted text of one memory
 */
memoriesRoutes.get('/download/:id', async (c) => {
  const service = getServiceRegistry().get(Services.Memory);
  const data = await service.download(c.req.param('id'));

  return okResponse(c, { data });
});

/**
 * DELETE /delete/:id - Remove one memory; repeat deletes succeed
 */
memoriesRoutes.delete('/delete/:id', async (c) => {
  const service = getServiceRegistry().get(Services.Memory);
  const deleted = await service.delete(c.req.param('id'));

  return okResponse(c, { deleted });
});

/**
 * POST /query/:owner_id - Emotion/keyword search over decrypted memories
 */
memoriesRoutes.post('/query/:owner_id', async (c) => {
  const body = validateBody(queryMemorySchema, await readJsonBody(c, { allowEmpty: true }));
  const filter: MemoryQueryFilter = {
    emotion: body.emotion ?? undefined,
    keyword: body.keyword ?? undefined,
    match: body.match ?? undefined,
  };

  const service = getServiceRegistry().get(Services.Memory);
  const outcome = await service.query(c.req.param('owner_id'), filter);

  c.header(SKIPPED_RECORDS_HEADER, String(outcome.skipped));
  return okResponse(c, { results: outcome.results.map(toMatchBody) });
});
