import {
	ApproveTranslationPayloadSchema,
	CreateSessionPayloadSchema,
	DenyTranslationPayloadSchema,
	InboundControlMessageSchema,
	JoinSessionPayloadSchema,
	ReleaseTasksPayloadSchema,
	SessionCodePayloadSchema,
	StudentLevelPayloadSchema,
	ToggleSimplificationPayloadSchema,
	TranslationRequestPayloadSchema,
	UpdateSettingsPayloadSchema,
	type ControlMessage,
	type CreateSessionPayload,
	type InboundControlMessage
} from "@read-along/shared/relay";
import type { FastifyBaseLogger } from "fastify";
import type { ZodError, ZodType, ZodTypeDef } from "zod";

import { recordUsage, type UsageRecorder } from "../../infra/logging/index.js";
import { languageName } from "../proxy/prompts.js";
import type {
	ClassroomSession,
	SessionRegistry,
	SessionRemovalReason,
	StudentRecord
} from "../sessions/session-registry.js";

const GUEST_ANONYMOUS_ID = "🐾 Guest";

export const RELAY_INBOUND_EVENTS = [
	"teacher_create_session",
	"student_join_session",
	"control",
	"teacher_end_session",
	"teacher_update_settings",
	"teacher_release_tasks",
	"teacher_toggle_simplification",
	"student_using_simplified",
	"student_request_translation",
	"teacher_approve_translation",
	"teacher_deny_translation"
] as const;

export type RelayInboundEvent = (typeof RELAY_INBOUND_EVENTS)[number];

/** Sends one event to one connection. Delivery is best-effort. */
export type RelayDeliver = (connectionId: string, event: string, payload: unknown) => void;

export interface SessionTranslator {
	translateForSession(session: ClassroomSession, targetLanguage: string): Promise<string>;
}

export type RelayLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export interface RelayHubOptions {
	sessions: SessionRegistry;
	deliver: RelayDeliver;
	translator?: SessionTranslator | null;
	usageRecorder?: UsageRecorder | null;
	logger?: RelayLogger | null;
	now?: () => number;
}

export interface CreatedSession {
	code: string;
	expiresAt: string;
}

/**
 * Room logic for live lessons. Holds no sockets: every outbound message goes
 * through `deliver`, so membership lives only in the session registry.
 */
export class RelayHub {
	private readonly sessions: SessionRegistry;
	private readonly deliver: RelayDeliver;
	private readonly translator: SessionTranslator | null;
	private readonly usageRecorder: UsageRecorder | null;
	private readonly logger: RelayLogger | null;
	private readonly now: () => number;
	private readonly detachRemovalListener: () => void;

	constructor(options: RelayHubOptions) {
		this.sessions = options.sessions;
		this.deliver = options.deliver;
		this.translator = options.translator ?? null;
		this.usageRecorder = options.usageRecorder ?? null;
		this.logger = options.logger ?? null;
		this.now = options.now ?? Date.now;
		this.detachRemovalListener = this.sessions.onRemoval((session, reason) => {
			this.announceRemoval(session, reason);
		});
	}

	close(): void {
		this.detachRemovalListener();
	}

	async handle(connectionId: string, event: RelayInboundEvent, payload: unknown): Promise<void> {
		switch (event) {
			case "teacher_create_session":
				this.onTeacherCreateSession(connectionId, payload);
				return;
			case "student_join_session":
				this.onStudentJoin(connectionId, payload);
				return;
			case "control":
				this.onControl(connectionId, payload);
				return;
			case "teacher_end_session":
				this.onTeacherEndSession(connectionId, payload);
				return;
			case "teacher_update_settings":
				this.onTeacherUpdateSettings(connectionId, payload);
				return;
			case "teacher_release_tasks":
				this.onTeacherReleaseTasks(connectionId, payload);
				return;
			case "teacher_toggle_simplification":
				this.onTeacherToggleSimplification(connectionId, payload);
				return;
			case "student_using_simplified":
				this.onStudentUsingSimplified(connectionId, payload);
				return;
			case "student_request_translation":
				this.onStudentRequestTranslation(connectionId, payload);
				return;
			case "teacher_approve_translation":
				await this.onTeacherApproveTranslation(connectionId, payload);
				return;
			case "teacher_deny_translation":
				this.onTeacherDenyTranslation(connectionId, payload);
				return;
		}
	}

	/**
	 * Creates a session, binding `teacherConnectionId` when the teacher is
	 * already connected.
	 */
	createSession(
		payload: CreateSessionPayload,
		teacherConnectionId: string | null,
		via: "http" | "socket"
	): CreatedSession {
		const session = this.sessions.create(
			{
				elevenlabsKey: payload.elevenlabsKey,
				aiKey: payload.aiKey || null,
				aiProvider: payload.aiProvider,
				voiceId: payload.voiceId,
				sttProvider: payload.sttProvider
			},
			teacherConnectionId
		);

		this.logger?.info({ code: session.code, via }, "Session created");
		void recordUsage(this.usageRecorder, {
			type: "session_created",
			code: session.code,
			aiProvider: session.keys.aiProvider,
			hasAiKey: session.keys.aiKey !== null,
			via,
			timestamp: this.now()
		});

		return { code: session.code, expiresAt: session.expiresAt.toISOString() };
	}

	/**
	 * Ends a session on behalf of an HTTP caller. The room is told through
	 * the registry's removal hook.
	 */
	endSession(code: string): boolean {
		return this.sessions.end(code) !== null;
	}

	updateText(code: string, text: string): boolean {
		const session = this.sessions.get(code);
		if (!session) {
			return false;
		}

		session.text = text;
		this.broadcast(session, "text_updated", { text });
		return true;
	}

	disconnect(connectionId: string): void {
		for (const departure of this.sessions.removeConnection(connectionId)) {
			const { session, student } = departure;
			if (!student) {
				continue;
			}

			session.translationRequests.delete(connectionId);
			session.studentLevels.delete(connectionId);
			this.notifyTeacherOfDeparture(session, student);
		}
	}

	private onTeacherCreateSession(connectionId: string, payload: unknown): void {
		const parsed = this.parse(connectionId, CreateSessionPayloadSchema, payload);
		if (!parsed) {
			return;
		}

		const created = this.createSession(parsed, connectionId, "socket");
		this.deliver(connectionId, "session_created", created);
	}

	private onStudentJoin(connectionId: string, payload: unknown): void {
		const parsed = this.parse(connectionId, JoinSessionPayloadSchema, payload, "join_error");
		if (!parsed) {
			return;
		}

		this.joinStudent(connectionId, parsed.code, parsed.name);
	}

	private onControl(connectionId: string, payload: unknown): void {
		const message = this.parse(connectionId, InboundControlMessageSchema, payload);
		if (!message) {
			return;
		}

		switch (message.event) {
			case "join":
				this.joinStudent(connectionId, message.code, message.name);
				return;
			case "leave":
				this.leave(connectionId, message.code);
				return;
			default:
				this.fanOutPlayback(connectionId, message);
		}
	}

	private fanOutPlayback(connectionId: string, message: InboundControlMessage): void {
		const session = this.sessions.get(message.code);
		if (!session) {
			this.reportError(connectionId, `Session ${message.code} was not found or has expired`);
			return;
		}

		if (session.teacherConnectionId !== connectionId) {
			this.reportError(connectionId, "Only the teacher of this session can control playback");
			return;
		}

		const outbound: ControlMessage = { event: message.event };
		if (message.position !== undefined) {
			outbound.position = message.position;
		}
		if (message.speed !== undefined) {
			outbound.speed = message.speed;
		}

		for (const studentId of session.students.keys()) {
			this.deliver(studentId, "control", outbound);
		}
	}

	private joinStudent(connectionId: string, code: string, name?: string): void {
		const session = this.sessions.get(code);
		if (!session) {
			this.deliver(connectionId, "join_error", { error: `Session ${code} was not found or has expired` });
			return;
		}

		if (session.teacherConnectionId === connectionId) {
			this.reportError(connectionId, "The teacher connection cannot join its own session as a student");
			return;
		}

		const student = this.sessions.addStudent(session.code, connectionId, name);

		this.deliver(connectionId, "join_success", {
			code: session.code,
			text: session.text,
			settings: session.settings,
			tasksAvailable: session.tasksAvailable,
			tasks: session.tasksAvailable ? session.tasks : [],
			anonymousId: student.anonymousId,
			animalEmoji: student.animalEmoji,
			animalName: student.animalName,
			simplificationEnabled: session.simplificationEnabled
		});

		if (session.teacherConnectionId) {
			this.deliver(session.teacherConnectionId, "student_joined", {
				count: session.students.size,
				name: student.name,
				anonymousId: student.anonymousId,
				studentId: connectionId
			});
		}
	}

	private leave(connectionId: string, code: string): void {
		const session = this.sessions.get(code);
		if (!session) {
			this.reportError(connectionId, `Session ${code} was not found or has expired`);
			return;
		}

		if (session.teacherConnectionId === connectionId) {
			session.teacherConnectionId = null;
			return;
		}

		const student = this.sessions.removeStudent(session.code, connectionId);
		if (!student) {
			this.reportError(connectionId, `This connection is not part of session ${session.code}`);
			return;
		}

		session.translationRequests.delete(connectionId);
		session.studentLevels.delete(connectionId);
		this.notifyTeacherOfDeparture(session, student);
	}

	private onTeacherEndSession(connectionId: string, payload: unknown): void {
		const parsed = this.parse(connectionId, SessionCodePayloadSchema, payload);
		const session = parsed ? this.requireTeacher(connectionId, parsed.code) : null;
		if (!session) {
			return;
		}

		this.sessions.end(session.code);
		this.deliver(connectionId, "session_ended_confirmed", { success: true });
	}

	private onTeacherUpdateSettings(connectionId: string, payload: unknown): void {
		const parsed = this.parse(connectionId, UpdateSettingsPayloadSchema, payload);
		const session = parsed ? this.requireTeacher(connectionId, parsed.code) : null;
		if (!parsed || !session) {
			return;
		}

		session.settings = parsed.settings;
		this.broadcast(session, "settings_updated", { settings: parsed.settings });
	}

	private onTeacherReleaseTasks(connectionId: string, payload: unknown): void {
		const parsed = this.parse(connectionId, ReleaseTasksPayloadSchema, payload);
		const session = parsed ? this.requireTeacher(connectionId, parsed.code) : null;
		if (!parsed || !session) {
			return;
		}

		session.tasks = parsed.tasks;
		session.tasksAvailable = true;
		this.logger?.info({ code: session.code, taskCount: parsed.tasks.length }, "Tasks released");
		this.broadcast(session, "tasks_released", { tasks: parsed.tasks });
	}

	private onTeacherToggleSimplification(connectionId: string, payload: unknown): void {
		const parsed = this.parse(connectionId, ToggleSimplificationPayloadSchema, payload);
		const session = parsed ? this.requireTeacher(connectionId, parsed.code) : null;
		if (!parsed || !session) {
			return;
		}

		session.simplificationEnabled = parsed.enabled;
		this.broadcast(session, "simplification_status_changed", { enabled: parsed.enabled });
	}

	private onStudentUsingSimplified(connectionId: string, payload: unknown): void {
		const parsed = this.parse(connectionId, StudentLevelPayloadSchema, payload);
		if (!parsed) {
			return;
		}

		const session = this.sessions.get(parsed.code);
		if (!session) {
			this.reportError(connectionId, `Session ${parsed.code} was not found or has expired`);
			return;
		}

		const anonymousId = session.students.get(connectionId)?.anonymousId ?? null;
		session.studentLevels.set(connectionId, {
			level: parsed.level,
			anonymousId,
			updatedAt: new Date(this.now())
		});

		if (session.teacherConnectionId) {
			this.deliver(session.teacherConnectionId, "student_level_update", {
				studentId: connectionId,
				anonymousId,
				level: parsed.level
			});
		}
	}

	private onStudentRequestTranslation(connectionId: string, payload: unknown): void {
		const parsed = this.parse(connectionId, TranslationRequestPayloadSchema, payload);
		if (!parsed) {
			return;
		}

		const session = this.sessions.get(parsed.code);
		if (!session) {
			this.reportError(connectionId, `Session ${parsed.code} was not found or has expired`);
			return;
		}

		const anonymousId = session.students.get(connectionId)?.anonymousId ?? GUEST_ANONYMOUS_ID;
		const name = languageName(parsed.language);
		session.translationRequests.set(connectionId, {
			language: parsed.language,
			languageName: name,
			status: "pending",
			anonymousId,
			requestedAt: new Date(this.now())
		});

		this.deliver(connectionId, "translation_request_sent", {
			language: parsed.language,
			languageName: name
		});

		if (session.teacherConnectionId) {
			this.deliver(session.teacherConnectionId, "translation_request_received", {
				studentId: connectionId,
				anonymousId,
				language: parsed.language,
				languageName: name
			});
		}
	}

	private async onTeacherApproveTranslation(connectionId: string, payload: unknown): Promise<void> {
		const parsed = this.parse(connectionId, ApproveTranslationPayloadSchema, payload);
		const session = parsed ? this.requireTeacher(connectionId, parsed.code) : null;
		if (!parsed || !session) {
			return;
		}

		const request = session.translationRequests.get(parsed.studentId);
		if (!request) {
			this.reportError(connectionId, "Translation request not found");
			return;
		}

		if (!session.text) {
			this.reportError(connectionId, "There is no text to translate yet");
			return;
		}

		request.layout = parsed.layout;

		if (!session.keys.aiKey || !this.translator) {
			request.status = "approved_no_translation";
			this.deliver(parsed.studentId, "translation_approved", {
				language: request.language,
				languageName: request.languageName,
				translatedText: null,
				layout: parsed.layout,
				message: "Translation approved, but no AI key is configured for automatic translation"
			});
			this.deliver(connectionId, "translation_sent", {
				studentId: parsed.studentId,
				anonymousId: request.anonymousId,
				success: true,
				translated: false
			});
			return;
		}

		let translatedText: string;
		try {
			translatedText = await this.translator.translateForSession(session, request.language);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			this.logger?.warn({ code: session.code, err: error }, "Translation for student failed");
			this.reportError(connectionId, `Translation failed: ${message}`);
			return;
		}

		// The room may have ended, or the student left, while the provider answered.
		if (this.sessions.get(session.code) !== session || session.translationRequests.get(parsed.studentId) !== request) {
			this.logger?.debug({ code: session.code }, "Dropping translation for a request that is gone");
			return;
		}

		request.status = "approved";
		request.translatedText = translatedText;

		this.deliver(parsed.studentId, "translation_approved", {
			language: request.language,
			languageName: request.languageName,
			translatedText,
			layout: parsed.layout
		});
		this.deliver(connectionId, "translation_sent", {
			studentId: parsed.studentId,
			anonymousId: request.anonymousId,
			success: true,
			translated: true
		});
	}

	private onTeacherDenyTranslation(connectionId: string, payload: unknown): void {
		const parsed = this.parse(connectionId, DenyTranslationPayloadSchema, payload);
		const session = parsed ? this.requireTeacher(connectionId, parsed.code) : null;
		if (!parsed || !session) {
			return;
		}

		const request = session.translationRequests.get(parsed.studentId);
		if (!request) {
			this.reportError(connectionId, "Translation request not found");
			return;
		}

		request.status = "denied";
		this.deliver(parsed.studentId, "translation_denied", {
			message: "Your translation request was declined"
		});
		this.deliver(connectionId, "translation_request_removed", {
			studentId: parsed.studentId,
			anonymousId: request.anonymousId
		});
	}

	private announceRemoval(session: ClassroomSession, reason: SessionRemovalReason): void {
		const message =
			reason === "expired" ? "The session has expired" : "The session was ended by the teacher";
		this.broadcast(session, "session_ended", { reason, message });

		this.logger?.info({ code: session.code, reason }, "Session removed");
		const timestamp = this.now();
		void recordUsage(
			this.usageRecorder,
			reason === "expired"
				? {
						type: "session_expired",
						code: session.code,
						studentCount: session.students.size,
						timestamp
					}
				: {
						type: "session_ended",
						code: session.code,
						studentCount: session.students.size,
						durationMs: Math.max(0, timestamp - session.createdAt.getTime()),
						timestamp
					}
		);
	}

	private notifyTeacherOfDeparture(session: ClassroomSession, student: StudentRecord): void {
		if (!session.teacherConnectionId) {
			return;
		}

		this.deliver(session.teacherConnectionId, "student_left", {
			count: session.students.size,
			anonymousId: student.anonymousId,
			studentId: student.connectionId
		});
	}

	/** Delivers to the teacher first, then every student in join order. */
	private broadcast(session: ClassroomSession, event: string, payload: unknown): void {
		if (session.teacherConnectionId) {
			this.deliver(session.teacherConnectionId, event, payload);
		}
		for (const studentId of session.students.keys()) {
			this.deliver(studentId, event, payload);
		}
	}

	private requireTeacher(connectionId: string, code: string): ClassroomSession | null {
		const session = this.sessions.get(code);
		if (!session || session.teacherConnectionId !== connectionId) {
			this.reportError(connectionId, "Not permitted or session not found");
			return null;
		}
		return session;
	}

	private parse<Output, Input>(
		connectionId: string,
		schema: ZodType<Output, ZodTypeDef, Input>,
		payload: unknown,
		errorEvent = "session_error"
	): Output | null {
		const result = schema.safeParse(payload ?? {});
		if (result.success) {
			return result.data;
		}

		this.deliver(connectionId, errorEvent, { error: formatIssues(result.error) });
		return null;
	}

	private reportError(connectionId: string, error: string): void {
		this.deliver(connectionId, "session_error", { error });
	}
}

function formatIssues(error: ZodError): string {
	const issue = error.issues[0];
	if (!issue) {
		return "Invalid payload";
	}

	const path = issue.path.join(".");
	return path ? `${path}: ${issue.message}` : issue.message;
}
