import type { RotationSchedule } from '@quizcast/types';

/** Civil timezone the rotation runs in unless configured otherwise. */
export const DEFAULT_TIMEZONE = 'America/Sao_Paulo';

/** Topics offered for manual sends and used by the default rotation. */
export const defaultTopics = [
  'Penal',
  'Constitucional',
  'Raciocínio Lógico',
  'Processo Penal',
  'Direitos Humanos',
] as const;

/** Default 3-day rotation: morning, afternoon and evening slots. */
export const defaultRotation: RotationSchedule = {
  timezone: DEFAULT_TIMEZONE,
  buckets: {
    1: ['Penal', 'Constitucional', 'Raciocínio Lógico'],
    2: ['Processo Penal', 'Direitos Humanos', 'Penal'],
    3: ['Constitucional', 'Raciocínio Lógico', 'Processo Penal'],
  },
  slots: [
    { time: '08:00', slot: 0 },
    { time: '15:00', slot: 1 },
    { time: '20:00', slot: 2 },
  ],
};

/** Union of built-in topic names. */
export type BuiltinTopic = (typeof defaultTopics)[number];
