/**
 * Actor constructors. The key is the vote uniqueness key, so a registered
 * attendee and an anonymous session can never collide.
 */

import type { Actor, AttendeeId, SessionToken } from './types';

export function attendeeActor(attendeeId: AttendeeId): Actor {
  return { kind: 'attendee', attendeeId, key: `attendee:${attendeeId}` };
}

export function sessionActor(sessionToken: SessionToken): Actor {
  return { kind: 'session', sessionToken, key: `session:${sessionToken}` };
}
