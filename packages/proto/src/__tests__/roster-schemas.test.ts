import { describe, it, expect } from 'vitest';
import {
  AddParticipantRequestSchema,
  BulkParticipantsRequestSchema,
  AddGiftRequestSchema,
  BulkGiftsRequestSchema,
  GiftParamsSchema,
  ParticipantNameSchema,
} from '../api/roster';

describe('ParticipantNameSchema', () => {
  it('trims names', () => {
    expect(ParticipantNameSchema.parse('  Alice ')).toBe('Alice');
  });

  it('stores numbers in decimal form', () => {
    expect(ParticipantNameSchema.parse(42)).toBe('42');
  });

  it('rejects blank names', () => {
    const result = ParticipantNameSchema.safeParse('   ');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Participant name cannot be empty');
    }
  });

  it('rejects booleans', () => {
    expect(ParticipantNameSchema.safeParse(true).success).toBe(false);
  });
});

describe('AddParticipantRequestSchema', () => {
  it('requires a participant', () => {
    expect(AddParticipantRequestSchema.safeParse({}).success).toBe(false);
    expect(AddParticipantRequestSchema.parse({ participant: 'Bob' })).toEqual({ participant: 'Bob' });
  });
});

describe('BulkParticipantsRequestSchema', () => {
  it('drops null and blank entries', () => {
    const result = BulkParticipantsRequestSchema.parse({ participants: [' Alice', null, '', 7, '  '] });
    expect(result.participants).toEqual(['Alice', '7']);
  });

  it('rejects a list without any valid name', () => {
    const result = BulkParticipantsRequestSchema.safeParse({ participants: [null, ' '] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('No valid participant in the list');
    }
  });

  it('rejects a value that is not a list', () => {
    const result = BulkParticipantsRequestSchema.safeParse({ participants: 'Alice' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Participants must be a list');
    }
  });
});

describe('gift schemas', () => {
  it('truncates fractional gift numbers', () => {
    expect(AddGiftRequestSchema.parse({ gift: 12.9 })).toEqual({ gift: 12 });
  });

  it('rejects a gift given as a string', () => {
    const result = AddGiftRequestSchema.safeParse({ gift: '12' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Gift must be a number');
    }
  });

  it('rejects a gift number outside the integer column range', () => {
    const result = AddGiftRequestSchema.safeParse({ gift: 3e9 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toMatchObject([{ path: ['gift'], message: 'Gift number is out of range' }]);
    }
    expect(AddGiftRequestSchema.safeParse({ gift: 1e300 }).success).toBe(false);
    expect(AddGiftRequestSchema.parse({ gift: 2147483647.9 })).toEqual({ gift: 2147483647 });
    expect(AddGiftRequestSchema.parse({ gift: -2147483648 })).toEqual({ gift: -2147483648 });
  });

  it('validates every bulk entry', () => {
    expect(BulkGiftsRequestSchema.parse({ gifts: [1, 2.5, 3] })).toEqual({ gifts: [1, 2, 3] });
    expect(BulkGiftsRequestSchema.safeParse({ gifts: [1, 'two'] }).success).toBe(false);
    expect(BulkGiftsRequestSchema.safeParse({ gifts: [] }).success).toBe(false);
  });

  it('coerces the path parameter', () => {
    expect(GiftParamsSchema.parse({ gift: '17' })).toEqual({ gift: 17 });
    expect(GiftParamsSchema.safeParse({ gift: '1.5' }).success).toBe(false);
    expect(GiftParamsSchema.safeParse({ gift: 'abc' }).success).toBe(false);
    expect(GiftParamsSchema.safeParse({ gift: '3000000000' }).success).toBe(false);
  });
});
