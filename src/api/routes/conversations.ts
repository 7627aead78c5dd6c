import { FastifyInstance, FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import { SessionEngine } from '../../domain/session/engine';
import { logExecution } from '../../infra/logging/logger';
import { EngineResult } from '../../shared/types';
import { MAX_MESSAGE_LENGTH, isValidIdentifier } from '../../shared/validation';

export interface ConversationRouteOptions {
  engine: SessionEngine;
}

const identifier = z.string().refine(isValidIdentifier, { message: 'Invalid identifier format' });

const conversationParams = z.object({ conversationId: identifier });
const userParams = z.object({ userId: identifier });

const createConversationBody = z.object({
  userId: identifier,
  title: z.string().trim().min(1).max(200).optional(),
});

const messageBody = z.object({
  message: z.string().max(MAX_MESSAGE_LENGTH),
});

const chatBody = z.object({
  userId: identifier,
  message: z.string().max(MAX_MESSAGE_LENGTH),
});

/**
 * ok → `{ success, data }`, not_found → 404, error → thrown to the error handler.
 */
function sendResult<T>(reply: FastifyReply, result: EngineResult<T>, okStatus: number = 200) {
  switch (result.status) {
    case 'ok':
      return reply.status(okStatus).send({ success: true, data: result.value });
    case 'not_found':
      return reply.status(404).send({
        success: false,
        error: result.message,
        correlationId: reply.request.correlationId,
      });
    case 'error':
      throw result.error;
  }
}

export const conversationRoutes: FastifyPluginAsync<ConversationRouteOptions> = async (
  app: FastifyInstance,
  options: ConversationRouteOptions
) => {
  const { engine } = options;

  /**
   * POST /conversations
   * Open a conversation; any active one of the same user is completed first
   */
  app.post('/conversations', async (request, reply) => {
    const body = createConversationBody.parse(request.body);

    const result = await engine.createConversation(body.userId, body.title);
    if (result.status === 'ok') {
      request.log.info({ conversationId: result.value.conversationId, userId: body.userId }, 'Conversation opened');
    }

    return sendResult(reply, result, 201);
  });

  app.get('/conversations/:conversationId', async (request, reply) => {
    const { conversationId } = conversationParams.parse(request.params);
    return sendResult(reply, await engine.getConversation(conversationId));
  });

  app.get('/conversations/:conversationId/summary', async (request, reply) => {
    const { conversationId } = conversationParams.parse(request.params);
    return sendResult(reply, await engine.getConversationSummary(conversationId));
  });

  app.delete('/conversations/:conversationId', async (request, reply) => {
    const { conversationId } = conversationParams.parse(request.params);
    return sendResult(reply, await engine.deleteConversation(conversationId));
  });

  app.get('/users/:userId/conversations', async (request, reply) => {
    const { userId } = userParams.parse(request.params);
    return sendResult(reply, await engine.getUserConversations(userId));
  });

  /**
   * POST /conversations/:conversationId/messages
   * One user turn: evidence, stage, completion, persisted reply
   */
  app.post('/conversations/:conversationId/messages', async (request, reply) => {
    const { conversationId } = conversationParams.parse(request.params);
    const body = messageBody.parse(request.body);

    const result = await logExecution(
      request.correlationId,
      'appendTurn',
      () => engine.appendTurn(conversationId, body.message),
      request.log
    );

    return sendResult(reply, result);
  });

  /**
   * POST /chat
   * Turn against the user's active conversation, opening one when there is none
   */
  app.post('/chat', async (request, reply) => {
    const body = chatBody.parse(request.body);
    const result = await logExecution(
      request.correlationId,
      'chat',
      () => engine.startOrContinueChat(body.userId, body.message),
      request.log
    );

    return sendResult(reply, result);
  });

  app.post('/conversations/:conversationId/analysis', async (request, reply) => {
    const { conversationId } = conversationParams.parse(request.params);
    const result = await logExecution(
      request.correlationId,
      'analyzeConversation',
      () => engine.analyzeConversation(conversationId),
      request.log
    );

    return sendResult(reply, result);
  });
};
