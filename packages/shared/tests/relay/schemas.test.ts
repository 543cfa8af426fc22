import { describe, expect, it } from 'vitest';
import {
  CreateSessionPayloadSchema,
  DEFAULT_VOICE_ID,
  InboundControlMessageSchema,
  SESSION_CODE_ALPHABET,
  normalizeSessionCode,
} from '../../src/index.js';

describe('session codes', () => {
  it('uses an alphabet without look-alike characters', () => {
    for (const ambiguous of ['0', 'O', '1', 'I']) {
      expect(SESSION_CODE_ALPHABET).not.toContain(ambiguous);
    }
    expect(SESSION_CODE_ALPHABET).toHaveLength(32);
  });

  it('normalizes case and whitespace', () => {
    expect(normalizeSessionCode('  ab3xyz ')).toBe('AB3XYZ');
  });
});

describe('CreateSessionPayloadSchema', () => {
  it('requires an ElevenLabs key and fills defaults', () => {
    expect(CreateSessionPayloadSchema.parse({ elevenlabsKey: 'test-secret' })).toEqual({
      elevenlabsKey: 'test-secret',
      aiKey: '',
      aiProvider: 'openai',
      voiceId: DEFAULT_VOICE_ID,
      sttProvider: 'browser',
    });

    const missing = CreateSessionPayloadSchema.safeParse({ aiKey: 'test-secret' });
    expect(missing.success).toBe(false);
    if (!missing.success) {
      expect(missing.error.issues[0]?.message).toBe('ElevenLabs API key is required');
    }
  });
});

describe('InboundControlMessageSchema', () => {
  it('accepts playback events with a word position and speed', () => {
    expect(InboundControlMessageSchema.parse({ event: 'seek', code: 'abc234', position: 12, speed: 1.25 })).toEqual({
      event: 'seek',
      code: 'ABC234',
      position: 12,
      speed: 1.25,
    });
  });

  it('rejects unknown events and negative positions', () => {
    expect(InboundControlMessageSchema.safeParse({ event: 'rewind', code: 'ABC234' }).success).toBe(false);
    expect(InboundControlMessageSchema.safeParse({ event: 'seek', code: 'ABC234', position: -1 }).success).toBe(
      false
    );
  });
});
