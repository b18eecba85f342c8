import { NextFunction, Request, Response } from 'express';
import { NotFoundError, ok } from '@lendwise/shared-kernel';
import type { ConversationParams, MessageBody } from '../dtos/conversation.dto';
import type { Orchestrator } from '../services/orchestrator.service';

export function createConversationController(orchestrator: Orchestrator) {
  return {
    async start(_req: Request, res: Response, next: NextFunction) {
      try {
        const state = orchestrator.startConversation();
        res.status(201).json(ok({ conversationId: state.conversationId, state }));
      } catch (err) {
        next(err);
      }
    },

    async sendMessage(req: Request, res: Response, next: NextFunction) {
      try {
        const { conversationId } = req.params as ConversationParams;
        const body = req.body as MessageBody;
        const result = await orchestrator.processMessage(conversationId, body.text);
        res.json(ok({ conversationId: result.conversationId, reply: result.replyText, state: result.state }));
      } catch (err) {
        next(err);
      }
    },

    async getState(req: Request, res: Response, next: NextFunction) {
      try {
        const { conversationId } = req.params as ConversationParams;
        const state = orchestrator.getState(conversationId);
        if (!state) throw new NotFoundError('Conversation', conversationId);
        res.json(ok(state));
      } catch (err) {
        next(err);
      }
    },

    async reset(req: Request, res: Response, next: NextFunction) {
      try {
        const { conversationId } = req.params as ConversationParams;
        const cleared = await orchestrator.resetConversation(conversationId);
        res.json(ok({ conversationId, cleared }));
      } catch (err) {
        next(err);
      }
    },
  };
}
