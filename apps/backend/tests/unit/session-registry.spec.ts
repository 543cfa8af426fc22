import { afterEach, describe, expect, it, vi } from "vitest";

import { ANONYMOUS_ANIMALS, pickAnonymousIdentity } from "../../src/services/sessions/anonymous-names.js";
import {
	SessionNotFoundError,
	SessionRegistry,
	type ClassroomSession,
	type SessionKeys,
	type SessionRemovalReason
} from "../../src/services/sessions/session-registry.js";

const HOUR_MS = 60 * 60 * 1000;

const keys: SessionKeys = {
	elevenlabsKey: "test-elevenlabs-key",
	aiKey: "test-ai-key",
	aiProvider: "openai",
	voiceId: "voice123",
	sttProvider: "browser"
};

function createClock(start = 1_700_000_000_000) {
	let current = start;
	return {
		now: () => current,
		advance: (milliseconds: number) => {
			current += milliseconds;
		}
	};
}

describe("SessionRegistry", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("creates six character codes from the unambiguous alphabet", () => {
		const registry = new SessionRegistry();
		const session = registry.create(keys);

		expect(session.code).toMatch(/^[ABCDEFGHJKLMNPQRSTUVWXYZ23456789]{6}$/);
		expect(registry.get(session.code.toLowerCase())).toBe(session);
		expect(registry.size).toBe(1);
	});

	it("derives the code from the random source", () => {
		const registry = new SessionRegistry({ random: () => 0 });
		expect(registry.create(keys).code).toBe("AAAAAA");
	});

	it("expires sessions after the timeout and wipes their keys", () => {
		const clock = createClock();
		const registry = new SessionRegistry({ timeoutMs: 3 * HOUR_MS, now: clock.now });
		const removals: Array<[string, SessionRemovalReason]> = [];
		registry.onRemoval((session, reason) => removals.push([session.code, reason]));

		const session = registry.create(keys);
		clock.advance(3 * HOUR_MS - 1);
		expect(registry.get(session.code)).toBe(session);

		clock.advance(1);
		expect(registry.get(session.code)).toBeNull();
		expect(session.keys.elevenlabsKey).toBe("");
		expect(session.keys.aiKey).toBeNull();
		expect(removals).toEqual([[session.code, "expired"]]);
	});

	it("sweeps expired sessions in bulk", () => {
		const clock = createClock();
		const registry = new SessionRegistry({ timeoutMs: HOUR_MS, now: clock.now });
		const first = registry.create(keys);
		clock.advance(HOUR_MS / 2);
		const second = registry.create(keys);
		clock.advance(HOUR_MS / 2);

		expect(registry.sweepExpired()).toEqual([first.code]);
		expect(registry.get(second.code)).toBe(second);
	});

	it("runs the sweep on an interval until stopped", () => {
		vi.useFakeTimers();
		const clock = createClock();
		const registry = new SessionRegistry({ timeoutMs: 1000, now: clock.now });
		registry.create(keys);

		registry.startSweep(500);
		clock.advance(1000);
		vi.advanceTimersByTime(500);
		expect(registry.size).toBe(0);

		registry.stopSweep();
	});

	it("ends a session with the ended reason", () => {
		const registry = new SessionRegistry();
		const reasons: SessionRemovalReason[] = [];
		registry.onRemoval((_session, reason) => reasons.push(reason));
		const session = registry.create(keys);

		expect(registry.end(session.code)).toBe(session);
		expect(registry.end(session.code)).toBeNull();
		expect(reasons).toEqual(["ended"]);
		expect(() => registry.require(session.code)).toThrow(SessionNotFoundError);
	});

	it("stops notifying a listener after it unsubscribes", () => {
		const registry = new SessionRegistry();
		const listener = vi.fn();
		const unsubscribe = registry.onRemoval(listener);
		unsubscribe();

		registry.end(registry.create(keys).code);
		expect(listener).not.toHaveBeenCalled();
	});

	it("hands out distinct animals in order and keeps joins idempotent", () => {
		const registry = new SessionRegistry();
		const session = registry.create(keys, "teacher");

		const first = registry.addStudent(session.code, "s1", " Mia ");
		const second = registry.addStudent(session.code, "s2");
		const again = registry.addStudent(session.code, "s1");

		expect(first.anonymousId).toBe("🦊 Fox");
		expect(first.name).toBe("Mia");
		expect(second.anonymousId).toBe("🐻 Bear");
		expect(second.name).toBeNull();
		expect(again).toBe(first);
		expect(session.students.size).toBe(2);
	});

	it("reuses a freed animal for the next student", () => {
		const registry = new SessionRegistry();
		const session = registry.create(keys);
		registry.addStudent(session.code, "s1");
		registry.addStudent(session.code, "s2");

		registry.removeStudent(session.code, "s1");
		expect(registry.addStudent(session.code, "s3").animalName).toBe("Fox");
	});

	it("drops a closed connection from every room it belongs to", () => {
		const registry = new SessionRegistry();
		const taught: ClassroomSession = registry.create(keys, "conn-1");
		const attended = registry.create(keys, "teacher-2");
		registry.addStudent(attended.code, "conn-1");

		const departures = registry.removeConnection("conn-1");

		expect(departures).toHaveLength(2);
		expect(taught.teacherConnectionId).toBeNull();
		expect(attended.students.size).toBe(0);
		const student = departures.find((departure) => departure.student !== null);
		expect(student?.session).toBe(attended);
		expect(student?.wasTeacher).toBe(false);
	});
});

describe("pickAnonymousIdentity", () => {
	it("numbers a reused animal once every animal is taken", () => {
		const used = new Set(ANONYMOUS_ANIMALS.map((_animal, index) => index));
		const identity = pickAnonymousIdentity(used, ANONYMOUS_ANIMALS.length, () => 0);

		expect(identity).toEqual({
			animalIndex: 0,
			animalEmoji: "🦊",
			animalName: `Fox ${ANONYMOUS_ANIMALS.length + 1}`,
			anonymousId: `🦊 Fox ${ANONYMOUS_ANIMALS.length + 1}`
		});
	});
});
