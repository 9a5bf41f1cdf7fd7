/**
 * Identity Resolver
 *
 * Maps an inbound request to the actor whose key guards vote uniqueness.
 *
 * Policy for sessions that later register: registration CLAIMS the
 * session's anonymous votes. In the same transaction that creates (or
 * rebinds) the attendee, every vote keyed `session:<token>` in that jam is
 * re-keyed to `attendee:<id>`. Where the attendee had already voted for the
 * same song, the anonymous duplicate is deleted. From then on the session
 * token and the attendee id resolve to the same actor.
 *
 * Debug logging: Enable with DEBUG=jam:identity
 */

import createDebug from 'debug';
import { randomUUID } from 'crypto';
import type { PersistenceLayer } from './persistence';
import type {
  Actor,
  Attendee,
  AttendeeId,
  AttendeeRegistrationResult,
  Jam,
  JamId,
  SessionToken,
} from '../conductor/types';
import { attendeeActor, sessionActor } from '../conductor/actors';
import { InvalidRequest, NameTaken, UnknownAttendee, UnknownJam } from '../conductor/errors';
import { withRetry, DEFAULT_MAX_RETRIES } from './store';

const debug = createDebug('jam:identity');

export interface IdentityResolver {
  requireJam(jamId: JamId): Jam;
  resolve(jamId: JamId, sessionToken?: SessionToken | null, attendeeId?: AttendeeId | null): Actor;
  requireAttendee(jamId: JamId, attendeeId: AttendeeId): Attendee;
  registerAttendee(jamId: JamId, name: string, sessionToken: SessionToken): Promise<AttendeeRegistrationResult>;
}

export function createIdentityResolver(
  persistence: PersistenceLayer,
  options: { maxRetries?: number } = {}
): IdentityResolver {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

  function requireJam(jamId: JamId): Jam {
    const jam = persistence.getJam(jamId);
    if (!jam) throw new UnknownJam(jamId);
    return jam;
  }

  function requireAttendee(jamId: JamId, attendeeId: AttendeeId): Attendee {
    requireJam(jamId);
    const attendee = persistence.getAttendee(attendeeId);
    if (!attendee || attendee.jamId !== jamId) {
      throw new UnknownAttendee(attendeeId);
    }
    return attendee;
  }

  return {
    requireJam,
    requireAttendee,

    resolve(jamId: JamId, sessionToken?: SessionToken | null, attendeeId?: AttendeeId | null): Actor {
      requireJam(jamId);

      if (attendeeId) {
        return attendeeActor(requireAttendee(jamId, attendeeId).id);
      }

      if (sessionToken) {
        const registered = persistence.findAttendeeBySession(jamId, sessionToken);
        if (registered) {
          debug('session %s resolves to attendee %s', sessionToken, registered.id);
          return attendeeActor(registered.id);
        }
        return sessionActor(sessionToken);
      }

      throw new InvalidRequest('attendee_id or session_id is required');
    },

    registerAttendee(jamId: JamId, name: string, sessionToken: SessionToken): Promise<AttendeeRegistrationResult> {
      const trimmedName = name.trim();
      if (!trimmedName) {
        return Promise.reject(new InvalidRequest('Name is required'));
      }
      if (!sessionToken) {
        return Promise.reject(new InvalidRequest('session_id is required'));
      }

      return withRetry('registerAttendee', maxRetries, () =>
        persistence.transaction(() => {
          requireJam(jamId);

          const byName = persistence.findAttendeeByName(jamId, trimmedName);
          const bySession = persistence.findAttendeeBySession(jamId, sessionToken);

          if (byName && bySession && byName.id !== bySession.id) {
            throw new NameTaken(trimmedName);
          }

          let attendee: Attendee;
          let created = false;
          const existing = byName ?? bySession;

          if (existing) {
            // Same person on a new browser session, or a rename from the same session
            persistence.updateAttendee(existing.id, trimmedName, sessionToken);
            attendee = { ...existing, name: trimmedName, sessionId: sessionToken };
          } else {
            attendee = {
              id: randomUUID(),
              jamId,
              name: trimmedName,
              sessionId: sessionToken,
              registeredAt: new Date().toISOString(),
            };
            persistence.insertAttendee(attendee);
            created = true;
          }

          const from = sessionActor(sessionToken).key;
          const to = attendeeActor(attendee.id).key;
          const { claimed, droppedSongIds } = persistence.claimVotes(jamId, from, to, attendee.id);

          debug(
            'registerAttendee %s in %s: created=%s claimed=%d dropped=%d',
            attendee.id, jamId, created, claimed, droppedSongIds.length
          );

          return { attendee, created, claimedVotes: claimed, droppedSongIds };
        })
      );
    },
  };
}
