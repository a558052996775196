export * from './question/Question.js';
export * from './cache/RecencyCache.js';
export * from './cache/RecencyStore.js';
export * from './fetch/fetchWithRetry.js';
export * from './normalize/normalizeResponse.js';
export * from './provider/HttpQuestionProvider.js';
export * from './provider/MockQuestionProvider.js';
export * from './provider/ProviderFactory.js';
export * from './batch/BatchAssembler.js';
export * from './schedule/clock.js';
export * from './schedule/rotation.js';
export * from './schedule/ScheduleLoader.js';
export * from './schedule/RotationScheduler.js';
export * from './dispatch/poll.js';
export * from './dispatch/Dispatcher.js';
export * from './delivery/TelegramChannel.js';
export * from './delivery/ConsoleChannel.js';
export * from './telemetry/Transcript.js';
export * from './telemetry/Log.js';
