import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { calcAgeDays, dayOfTimestamp, daysBetween, formatDay, formatTime, parseDay, toSlashDay } from '../src/utils/dates';

describe('formatDay / formatTime', () => {
  test('use the calendar of the given time zone', () => {
    const instant = new Date('2024-01-31T15:30:00Z');
    assert.equal(formatDay(instant, 'Asia/Tokyo'), '2024-02-01');
    assert.equal(formatTime(instant, 'Asia/Tokyo'), '00:30:00');
    assert.equal(formatDay(instant, 'UTC'), '2024-01-31');
  });
});

describe('parseDay / daysBetween', () => {
  test('counts calendar days across a leap day', () => {
    assert.equal(daysBetween('2024-02-28', '2024-03-01'), 2);
  });

  test('rejects impossible and malformed days', () => {
    assert.equal(parseDay('2024-02-30'), undefined);
    assert.equal(parseDay('2024/02/01'), undefined);
    assert.equal(daysBetween('', '2024-03-01'), undefined);
  });

  test('converts to the slash form', () => {
    assert.equal(toSlashDay('2024-03-10'), '2024/03/10');
  });
});

describe('calcAgeDays', () => {
  test('measures from the publication day in the home time zone', () => {
    assert.equal(calcAgeDays('2024-03-10', '2024-03-01T23:30:00+09:00', 'Asia/Tokyo'), 9);
    // 08:30 on the 2nd in Tokyo
    assert.equal(calcAgeDays('2024-03-10', '2024-03-01T23:30:00Z', 'Asia/Tokyo'), 8);
  });

  test('is unknown without a usable timestamp', () => {
    assert.equal(calcAgeDays('2024-03-10', undefined, 'Asia/Tokyo'), undefined);
    assert.equal(calcAgeDays('2024-03-10', 'not a date', 'Asia/Tokyo'), undefined);
    assert.equal(dayOfTimestamp('  ', 'Asia/Tokyo'), undefined);
  });
});
