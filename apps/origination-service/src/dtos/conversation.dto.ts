import { z } from 'zod';

export const ConversationParamsDto = z.object({
  conversationId: z.string().trim().min(1).max(128),
});

export const MessageBodyDto = z.object({
  text: z.string().trim().min(1).max(2000),
});

export type ConversationParams = z.infer<typeof ConversationParamsDto>;
export type MessageBody = z.infer<typeof MessageBodyDto>;
