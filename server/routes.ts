/**
 * HTTP routes for jams and the song catalogue.
 *
 * Request bodies use snake_case (song_id, attendee_id, ...); responses are
 * camelCase. Every handler either answers or forwards a JamError to the
 * error middleware in app.ts.
 */

import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import type { MutationApi } from './mutations';
import type { JamService } from './jams';
import type { IdentityResolver } from './identity';
import type { VoteStore } from './store';
import { requireManager } from './middleware/manager';
import { InvalidRequest } from '../conductor/errors';
import { JAM_STATUSES } from '../conductor/types';

export interface RouteDeps {
  api: MutationApi;
  jams: JamService;
  identity: IdentityResolver;
  store: VoteStore;
  managerToken: string | null;
}

// ============================================================================
// Validation
// ============================================================================

const id = z.string().trim().min(1).max(128);
const optionalId = id.nullish();

const voteSchema = z.object({
  song_id: id,
  attendee_id: optionalId,
  session_id: optionalId,
});

const performSchema = z.object({
  song_id: id,
  attendee_id: id,
  instrument: z.string().max(64).optional(),
});

const unperformSchema = z.object({
  song_id: id,
  attendee_id: id,
});

const addSongSchema = z.object({ song_id: id });

const attendeeSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(64),
  session_id: id,
});

const actorQuerySchema = z.object({
  attendee_id: optionalId,
  session_id: optionalId,
});

const queueQuerySchema = z.object({
  sort: z.enum(['performance', 'votes', 'title', 'artist']).optional(),
  direction: z.enum(['asc', 'desc']).optional(),
});

const createJamSchema = z.object({
  name: z.string().trim().min(1).max(120),
  venue: z.string().trim().max(120).optional(),
  jam_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'jam_date must be YYYY-MM-DD').optional(),
});

const statusSchema = z.object({
  status: z.enum(JAM_STATUSES),
});

const createSongSchema = z.object({
  title: z.string().trim().min(1).max(200),
  artist: z.string().trim().min(1).max(200),
});

function parse<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidRequest(`${where}${issue?.message ?? 'Invalid request'}`);
  }
  return parsed.data;
}

/**
 * DELETE bodies are not sent by every client; fall back to the query string.
 */
function bodyOrQuery(req: Request): unknown {
  const body: unknown = req.body;
  if (body && typeof body === 'object' && Object.keys(body).length > 0) {
    return body;
  }
  return req.query;
}

/**
 * Forward sync throws and async rejections to the error middleware.
 */
function route(handler: (req: Request, res: Response) => unknown): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

// ============================================================================
// Routers
// ============================================================================

export function createJamRouter(deps: RouteDeps): Router {
  const { api, jams, identity, store } = deps;
  const router = Router();
  const manager = requireManager(deps.managerToken);

  // ── Manager actions ──────────────────────────────────────────────

  router.post('/', manager, route(async (req, res) => {
    const body = parse(createJamSchema, req.body);
    const jam = await jams.createJam({ name: body.name, venue: body.venue, jamDate: body.jam_date });
    res.status(201).json(jam);
  }));

  router.patch('/:id/status', manager, route(async (req, res) => {
    const body = parse(statusSchema, req.body);
    res.json(await api.setStatus(req.params.id, body.status));
  }));

  router.post('/:id/songs/:songId/play', manager, route(async (req, res) => {
    res.json(await api.markPlayed(req.params.id, req.params.songId));
  }));

  // ── Reads ────────────────────────────────────────────────────────

  router.get('/by-slug/:slug', route((req, res) => {
    const jam = jams.getJamBySlug(req.params.slug);
    res.json({ ...jam, queue: jams.rankedQueue(jam.id) });
  }));

  router.get('/:id', route((req, res) => {
    const jam = jams.getJam(req.params.id);
    res.json({ ...jam, queue: jams.rankedQueue(jam.id) });
  }));

  router.get('/:id/songs', route((req, res) => {
    const query = parse(queueQuerySchema, req.query);
    res.json(jams.queueView(req.params.id, query.sort, query.direction));
  }));

  router.get('/:id/attendees', route((req, res) => {
    res.json(jams.listAttendees(req.params.id));
  }));

  router.get('/:id/votes', route((req, res) => {
    const query = parse(actorQuerySchema, req.query);
    const actor = identity.resolve(req.params.id, query.session_id, query.attendee_id);
    res.json({ songIds: store.votedSongIds(req.params.id, actor) });
  }));

  router.get('/:id/songs/:songId/vote-status', route((req, res) => {
    const query = parse(actorQuerySchema, req.query);
    const actor = identity.resolve(req.params.id, query.session_id, query.attendee_id);
    res.json(store.voteStatus(req.params.id, req.params.songId, actor));
  }));

  router.get('/:id/performers', route((req, res) => {
    const query = parse(actorQuerySchema.pick({ attendee_id: true }), req.query);
    identity.requireJam(req.params.id);
    res.json(store.registrationsForJam(req.params.id, query.attendee_id ?? undefined));
  }));

  router.get('/:id/songs/:songId/performers', route((req, res) => {
    identity.requireJam(req.params.id);
    res.json(store.performersForSong(req.params.id, req.params.songId));
  }));

  // ── Mutations ────────────────────────────────────────────────────

  router.post('/:id/vote', route(async (req, res) => {
    const body = parse(voteSchema, req.body);
    res.json(await api.vote({
      jamId: req.params.id,
      songId: body.song_id,
      attendeeId: body.attendee_id,
      sessionId: body.session_id,
    }));
  }));

  router.post('/:id/perform', route(async (req, res) => {
    const body = parse(performSchema, req.body);
    const result = await api.registerPerformance({
      jamId: req.params.id,
      songId: body.song_id,
      attendeeId: body.attendee_id,
      instrument: body.instrument,
    });
    res.status(201).json(result);
  }));

  router.delete('/:id/perform', route(async (req, res) => {
    const body = parse(unperformSchema, bodyOrQuery(req));
    res.json(await api.unregisterPerformance({
      jamId: req.params.id,
      songId: body.song_id,
      attendeeId: body.attendee_id,
    }));
  }));

  router.post('/:id/songs', route(async (req, res) => {
    const body = parse(addSongSchema, req.body);
    res.status(201).json(await api.addSong(req.params.id, body.song_id));
  }));

  router.post('/:id/suggestions', route(async (req, res) => {
    const body = parse(createSongSchema, req.body);
    const result = await api.suggestSong(req.params.id, body);
    res.status(result.added ? 201 : 200).json(result);
  }));

  router.post('/:id/attendees', route(async (req, res) => {
    const body = parse(attendeeSchema, req.body);
    const result = await api.registerAttendee(req.params.id, body.name, body.session_id);
    res.status(result.created ? 201 : 200).json(result);
  }));

  return router;
}

export function createSongRouter(deps: Pick<RouteDeps, 'jams' | 'managerToken'>): Router {
  const router = Router();

  router.get('/', route((_req, res) => {
    res.json(deps.jams.listSongs());
  }));

  router.post('/', requireManager(deps.managerToken), route((req, res) => {
    const body = parse(createSongSchema, req.body);
    res.status(201).json(deps.jams.createSong(body));
  }));

  return router;
}
