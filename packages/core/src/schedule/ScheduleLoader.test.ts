import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ScheduleValidationError, loadSchedule, parseSchedule } from './ScheduleLoader.js';

const yaml = `
timezone: America/Manaus
buckets:
  1: [Penal, Constitucional, Raciocínio Lógico]
  2: [Processo Penal, Direitos Humanos, Penal]
  3: [Constitucional, Raciocínio Lógico, Processo Penal]
slots:
  - time: "07:30"
    slot: 0
  - time: "12:00"
    slot: 1
  - time: "21:15"
    slot: 2
`;

describe('loadSchedule', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'quizcast-schedule-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a YAML rotation', async () => {
    const path = join(dir, 'schedule.yml');
    await writeFile(path, yaml, 'utf8');
    const schedule = await loadSchedule(path);
    expect(schedule.timezone).toBe('America/Manaus');
    expect(schedule.buckets[2]).toEqual(['Processo Penal', 'Direitos Humanos', 'Penal']);
    expect(schedule.slots).toEqual([
      { time: '07:30', slot: 0 },
      { time: '12:00', slot: 1 },
      { time: '21:15', slot: 2 },
    ]);
  });

  it('reports a missing file as a schedule error', async () => {
    await expect(loadSchedule(join(dir, 'nope.yml'))).rejects.toBeInstanceOf(ScheduleValidationError);
  });
});

describe('parseSchedule', () => {
  const buckets = { 1: ['a', 'b', 'c'], 2: ['d', 'e', 'f'], 3: ['g', 'h', 'i'] };

  it('fills timezone and slots from the defaults', () => {
    const schedule = parseSchedule({ buckets });
    expect(schedule.timezone).toBe('America/Sao_Paulo');
    expect(schedule.slots.map((s) => s.time)).toEqual(['08:00', '15:00', '20:00']);
  });

  it('rejects a bucket without exactly three topics', () => {
    expect(() => parseSchedule({ buckets: { ...buckets, 2: ['d', 'e'] } })).toThrow(/^Invalid schedule: buckets\.2/);
  });

  it('rejects bad times, slots and timezones', () => {
    expect(() => parseSchedule({ buckets, slots: [{ time: '8:00', slot: 0 }] })).toThrow(
      'Invalid schedule: slots.0.time: expected HH:MM'
    );
    expect(() => parseSchedule({ buckets, slots: [{ time: '08:00', slot: 3 }] })).toThrow(ScheduleValidationError);
    expect(() => parseSchedule({ buckets, timezone: 'Nowhere/Land' })).toThrow(
      'Invalid schedule: timezone: unknown IANA timezone'
    );
  });

  it('rejects two slots at the same time', () => {
    const slots = [
      { time: '08:00', slot: 0 },
      { time: '08:00', slot: 1 },
    ];
    expect(() => parseSchedule({ buckets, slots })).toThrow('Invalid schedule: slots: duplicate time of day');
  });
});
