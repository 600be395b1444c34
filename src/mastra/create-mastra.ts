import { Mastra } from '@mastra/core/mastra';
import { PinoLogger } from '@mastra/loggers';
import type { Settings } from './config/settings';
import { createAnswerAgent } from './agents/answer-agent';
import { createImageReaderAgent } from './agents/image-reader-agent';
import { createRouterAgent } from './agents/router-agent';
import { createTablePlannerAgent } from './agents/table-planner-agent';

export function createMastra(settings: Pick<Settings, 'model' | 'logLevel'>) {
  return new Mastra({
    agents: {
      routerAgent: createRouterAgent(settings.model),
      answerAgent: createAnswerAgent(settings.model),
      tablePlannerAgent: createTablePlannerAgent(settings.model),
      imageReaderAgent: createImageReaderAgent(settings.model),
    },
    logger: new PinoLogger({
      name: 'Mastra',
      level: settings.logLevel,
    }),
  });
}
