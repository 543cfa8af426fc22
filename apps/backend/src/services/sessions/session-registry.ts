import type { LlmProvider } from "@read-along/shared/proxy";
import {
	SESSION_CODE_ALPHABET,
	SESSION_CODE_LENGTH,
	normalizeSessionCode,
	type SpeechToTextProvider,
	type StudentLevel,
	type TranslationLayout
} from "@read-along/shared/relay";
import type { ComprehensionTask } from "@read-along/shared/tasks";

import { pickAnonymousIdentity, type AnonymousIdentity } from "./anonymous-names.js";

const DEFAULT_TIMEOUT_MS = 3 * 60 * 60 * 1000;
const MAX_CODE_ATTEMPTS = 1000;

export interface SessionKeys {
	elevenlabsKey: string;
	aiKey: string | null;
	aiProvider: LlmProvider;
	voiceId: string;
	sttProvider: SpeechToTextProvider;
}

export interface StudentRecord extends AnonymousIdentity {
	connectionId: string;
	name: string | null;
	joinedAt: Date;
}

export type TranslationRequestStatus = "pending" | "approved" | "approved_no_translation" | "denied";

export interface TranslationRequestRecord {
	language: string;
	languageName: string;
	status: TranslationRequestStatus;
	anonymousId: string;
	requestedAt: Date;
	layout?: TranslationLayout;
	translatedText?: string;
}

export interface StudentLevelRecord {
	level: StudentLevel;
	anonymousId: string | null;
	updatedAt: Date;
}

export interface ClassroomSession {
	code: string;
	createdAt: Date;
	expiresAt: Date;
	teacherConnectionId: string | null;
	keys: SessionKeys;
	students: Map<string, StudentRecord>;
	text: string;
	settings: Record<string, unknown>;
	tasks: ComprehensionTask[];
	tasksAvailable: boolean;
	simplificationEnabled: boolean;
	translationRequests: Map<string, TranslationRequestRecord>;
	studentLevels: Map<string, StudentLevelRecord>;
}

export type SessionRemovalReason = "ended" | "expired";

export class SessionNotFoundError extends Error {
	readonly code = "SESSION_NOT_FOUND" as const;

	constructor(readonly sessionCode: string) {
		super(`Session ${sessionCode} was not found or has expired`);
		this.name = "SessionNotFoundError";
	}
}

export class SessionCodeExhaustedError extends Error {
	readonly code = "SESSION_CODE_EXHAUSTED" as const;

	constructor() {
		super("Unable to allocate a free session code");
		this.name = "SessionCodeExhaustedError";
	}
}

export interface SessionDeparture {
	session: ClassroomSession;
	/** Set when the connection was a student of the room. */
	student: StudentRecord | null;
	wasTeacher: boolean;
}

export interface SessionRegistryOptions {
	timeoutMs?: number;
	now?: () => number;
	random?: () => number;
}

export type SessionRemovalListener = (session: ClassroomSession, reason: SessionRemovalReason) => void;

/**
 * Process-local store of live classroom sessions. Expiry is checked on every
 * lookup and by an optional periodic sweep.
 */
export class SessionRegistry {
	private readonly sessions = new Map<string, ClassroomSession>();
	private readonly timeoutMs: number;
	private readonly now: () => number;
	private readonly random: () => number;
	private readonly removalListeners = new Set<SessionRemovalListener>();
	private sweepTimer: NodeJS.Timeout | null = null;

	constructor(options: SessionRegistryOptions = {}) {
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.now = options.now ?? Date.now;
		this.random = options.random ?? Math.random;
	}

	onRemoval(listener: SessionRemovalListener): () => void {
		this.removalListeners.add(listener);
		return () => {
			this.removalListeners.delete(listener);
		};
	}

	get size(): number {
		return this.sessions.size;
	}

	create(keys: SessionKeys, teacherConnectionId: string | null = null): ClassroomSession {
		const code = this.generateCode();
		const createdAt = this.now();

		const session: ClassroomSession = {
			code,
			createdAt: new Date(createdAt),
			expiresAt: new Date(createdAt + this.timeoutMs),
			teacherConnectionId,
			keys: { ...keys },
			students: new Map(),
			text: "",
			settings: {},
			tasks: [],
			tasksAvailable: false,
			simplificationEnabled: false,
			translationRequests: new Map(),
			studentLevels: new Map()
		};

		this.sessions.set(code, session);
		return session;
	}

	get(rawCode: string): ClassroomSession | null {
		const code = normalizeSessionCode(rawCode);
		const session = this.sessions.get(code);
		if (!session) {
			return null;
		}

		if (this.isExpired(session)) {
			this.remove(session, "expired");
			return null;
		}

		return session;
	}

	require(rawCode: string): ClassroomSession {
		const session = this.get(rawCode);
		if (!session) {
			throw new SessionNotFoundError(normalizeSessionCode(rawCode));
		}
		return session;
	}

	/**
	 * Deletes the session and wipes its keys. Returns the removed session so
	 * callers can notify whoever was in the room.
	 */
	end(rawCode: string): ClassroomSession | null {
		const session = this.get(rawCode);
		if (!session) {
			return null;
		}

		this.remove(session, "ended");
		return session;
	}

	addStudent(rawCode: string, connectionId: string, name?: string | null): StudentRecord {
		const session = this.require(rawCode);
		const existing = session.students.get(connectionId);
		if (existing) {
			return existing;
		}

		const usedIndices = new Set<number>();
		for (const student of session.students.values()) {
			usedIndices.add(student.animalIndex);
		}

		const identity = pickAnonymousIdentity(usedIndices, session.students.size, this.random);
		const student: StudentRecord = {
			connectionId,
			name: name?.trim() || null,
			joinedAt: new Date(this.now()),
			...identity
		};

		session.students.set(connectionId, student);
		return student;
	}

	removeStudent(rawCode: string, connectionId: string): StudentRecord | null {
		const session = this.get(rawCode);
		if (!session) {
			return null;
		}

		const student = session.students.get(connectionId) ?? null;
		session.students.delete(connectionId);
		return student;
	}

	/**
	 * Drops a closed connection from every room it was part of.
	 */
	removeConnection(connectionId: string): SessionDeparture[] {
		const departures: SessionDeparture[] = [];

		for (const session of this.liveSessions()) {
			const student = session.students.get(connectionId) ?? null;
			const wasTeacher = session.teacherConnectionId === connectionId;

			if (!student && !wasTeacher) {
				continue;
			}

			if (student) {
				session.students.delete(connectionId);
			}
			if (wasTeacher) {
				session.teacherConnectionId = null;
			}

			departures.push({ session, student, wasTeacher });
		}

		return departures;
	}

	sweepExpired(): string[] {
		const expired: string[] = [];
		for (const session of [...this.sessions.values()]) {
			if (this.isExpired(session)) {
				this.remove(session, "expired");
				expired.push(session.code);
			}
		}
		return expired;
	}

	startSweep(intervalMs: number): void {
		this.stopSweep();
		this.sweepTimer = setInterval(() => {
			this.sweepExpired();
		}, intervalMs);
		this.sweepTimer.unref();
	}

	stopSweep(): void {
		if (this.sweepTimer) {
			clearInterval(this.sweepTimer);
			this.sweepTimer = null;
		}
	}

	private *liveSessions(): Generator<ClassroomSession> {
		for (const session of [...this.sessions.values()]) {
			if (this.isExpired(session)) {
				this.remove(session, "expired");
				continue;
			}
			yield session;
		}
	}

	private isExpired(session: ClassroomSession): boolean {
		return this.now() >= session.expiresAt.getTime();
	}

	private remove(session: ClassroomSession, reason: SessionRemovalReason): void {
		this.sessions.delete(session.code);
		session.keys.elevenlabsKey = "";
		session.keys.aiKey = null;
		for (const listener of this.removalListeners) {
			listener(session, reason);
		}
	}

	private generateCode(): string {
		for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt += 1) {
			let code = "";
			for (let index = 0; index < SESSION_CODE_LENGTH; index += 1) {
				const position = Math.floor(this.random() * SESSION_CODE_ALPHABET.length);
				code += SESSION_CODE_ALPHABET.charAt(Math.min(position, SESSION_CODE_ALPHABET.length - 1));
			}

			const existing = this.sessions.get(code);
			if (!existing) {
				return code;
			}
			if (this.isExpired(existing)) {
				this.remove(existing, "expired");
				return code;
			}
		}

		throw new SessionCodeExhaustedError();
	}
}
