import { io as connect, type Socket } from "socket.io-client";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createReadAlongApp, type ReadAlongApp } from "../../src/api/index.js";

function nextEvent(socket: Socket, event: string): Promise<unknown> {
	return new Promise((resolve) => {
		socket.once(event, (payload: unknown) => {
			resolve(payload);
		});
	});
}

function readCode(payload: unknown): string {
	if (typeof payload !== "object" || payload === null || !("code" in payload) || typeof payload.code !== "string") {
		throw new Error("Expected a payload with a session code");
	}
	return payload.code;
}

describe("Socket relay", () => {
	let instance: ReadAlongApp | null = null;
	let baseUrl = "";
	const clients: Socket[] = [];

	async function client(): Promise<Socket> {
		const socket = connect(baseUrl, { transports: ["websocket"], forceNew: true, reconnection: false });
		clients.push(socket);
		await nextEvent(socket, "connect");
		return socket;
	}

	async function openRoom(teacher: Socket): Promise<string> {
		const created = nextEvent(teacher, "session_created");
		teacher.emit("teacher_create_session", { elevenlabsKey: "test-secret" });
		return readCode(await created);
	}

	async function join(student: Socket, code: string): Promise<unknown> {
		const joined = nextEvent(student, "join_success");
		student.emit("student_join_session", { code });
		return joined;
	}

	beforeEach(async () => {
		instance = await createReadAlongApp({ env: {}, usageRecorder: null, config: { logLevel: "silent" } });
		await instance.app.listen({ port: 0, host: "127.0.0.1" });
		const address = instance.app.server.address();
		if (!address || typeof address === "string") {
			throw new Error("Server did not bind a TCP port");
		}
		baseUrl = `http://127.0.0.1:${address.port}`;
	});

	afterEach(async () => {
		for (const socket of clients.splice(0)) {
			socket.disconnect();
		}
		if (instance) {
			await instance.app.close();
			instance = null;
		}
	});

	it("fans teacher playback out to the students of the room only", async () => {
		const teacher = await client();
		const code = await openRoom(teacher);
		const first = await client();
		const second = await client();
		await join(first, code);
		await join(second, code);

		const otherTeacher = await client();
		const otherCode = await openRoom(otherTeacher);
		const outsider = await client();
		await join(outsider, otherCode);

		const teacherControl: unknown[] = [];
		const outsiderControl: unknown[] = [];
		teacher.on("control", (payload: unknown) => teacherControl.push(payload));
		outsider.on("control", (payload: unknown) => outsiderControl.push(payload));

		const received = Promise.all([nextEvent(first, "control"), nextEvent(second, "control")]);
		teacher.emit("control", { event: "seek", code, position: 7, speed: 0.8 });

		expect(await received).toEqual([
			{ event: "seek", position: 7, speed: 0.8 },
			{ event: "seek", position: 7, speed: 0.8 }
		]);

		// A round trip on the teacher's socket flushes anything still in flight.
		const flushed = nextEvent(teacher, "settings_updated");
		teacher.emit("teacher_update_settings", { code, settings: {} });
		await flushed;
		expect(teacherControl).toEqual([]);
		expect(outsiderControl).toEqual([]);
	});

	it("greets a student with the shared text and an anonymous animal", async () => {
		const teacher = await client();
		const code = await openRoom(teacher);
		instance?.relay.updateText(code, "Der Hund bellt.");

		const student = await client();
		const joinedNotice = nextEvent(teacher, "student_joined");
		const welcome = await join(student, code);

		expect(welcome).toMatchObject({ code, text: "Der Hund bellt.", anonymousId: "🦊 Fox" });
		expect(await joinedNotice).toMatchObject({ count: 1, anonymousId: "🦊 Fox", studentId: student.id });
	});

	it("refuses playback control from a student", async () => {
		const teacher = await client();
		const code = await openRoom(teacher);
		const student = await client();
		await join(student, code);

		const refused = nextEvent(student, "session_error");
		student.emit("control", { event: "play", code });

		expect(await refused).toEqual({ error: "Only the teacher of this session can control playback" });
	});

	it("tells the teacher when a student disconnects", async () => {
		const teacher = await client();
		const code = await openRoom(teacher);
		const student = await client();
		await join(student, code);

		const left = nextEvent(teacher, "student_left");
		student.disconnect();

		expect(await left).toMatchObject({ count: 0, anonymousId: "🦊 Fox" });
	});

	it("ends the room for every student", async () => {
		const teacher = await client();
		const code = await openRoom(teacher);
		const student = await client();
		await join(student, code);

		const ended = nextEvent(student, "session_ended");
		const confirmed = nextEvent(teacher, "session_ended_confirmed");
		teacher.emit("teacher_end_session", { code });

		expect(await ended).toEqual({ reason: "ended", message: "The session was ended by the teacher" });
		expect(await confirmed).toEqual({ success: true });
		expect(instance?.sessions.get(code)).toBeNull();
	});
});
