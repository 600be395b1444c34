import 'dotenv/config';
import { loadSettings } from './config/settings';
import { createMastra } from './create-mastra';

export const mastra = createMastra(loadSettings());

export { createSession } from './session/create-session';
export { SessionContext, type IngestionReport } from './session/session-context';
export { loadSettings, type Settings } from './config/settings';
export * from './lib/errors';
export type { AgentResult, AgentStep, ArtifactInput, ArtifactKind } from './schemas';
