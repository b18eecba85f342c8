import { Router } from 'express';
import type { Router as ExpressRouter } from 'express';
import { createConversationController } from '../controllers/conversation.controller';
import { ConversationParamsDto, MessageBodyDto } from '../dtos/conversation.dto';
import { validate } from '../middlewares/validate';
import type { Orchestrator } from '../services/orchestrator.service';

export function createV1Router(orchestrator: Orchestrator): ExpressRouter {
  const router = Router();
  const controller = createConversationController(orchestrator);

  router.post('/conversations', controller.start);

  router.post(
    '/conversations/:conversationId/messages',
    validate({ params: ConversationParamsDto, body: MessageBodyDto }),
    controller.sendMessage,
  );

  router.get(
    '/conversations/:conversationId',
    validate({ params: ConversationParamsDto }),
    controller.getState,
  );

  router.delete(
    '/conversations/:conversationId',
    validate({ params: ConversationParamsDto }),
    controller.reset,
  );

  return router;
}
