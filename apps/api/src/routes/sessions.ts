import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AskStatus } from '../services/course-qa/conversation';
import type { SessionStore } from '../services/course-qa/session-store';

// Validation schema
const askQuestionSchema = z.object({
  question: z.string().min(1, 'Question is required'),
  proceed: z.boolean().optional(),
});

const OUTCOME_STATUS: Record<AskStatus, 200 | 400 | 404 | 502> = {
  answered: 200,
  declined: 200,
  empty_question: 400,
  no_content: 404,
  retrieval_failed: 502,
  composition_failed: 502,
};

function sessionNotFound() {
  return {
    error: {
      code: 'SESSION_NOT_FOUND',
      message: 'Session not found',
    },
  };
}

export function createSessionRoutes(store: SessionStore) {
  const sessions = new Hono();

  /**
   * POST /api/sessions
   * Start a conversation
   */
  sessions.post('/sessions', (c) => {
    const session = store.create();
    return c.json({ id: session.id, createdAt: session.createdAt.toISOString() }, 201);
  });

  /**
   * GET /api/sessions/:sessionId/turns
   * Conversation history, oldest first
   */
  sessions.get('/sessions/:sessionId/turns', (c) => {
    const session = store.get(c.req.param('sessionId'));
    if (!session) {
      return c.json(sessionNotFound(), 404);
    }
    return c.json({ turns: [...session.context.history] });
  });

  /**
   * POST /api/sessions/:sessionId/questions
   * Ask a question within a conversation
   */
  sessions.post('/sessions/:sessionId/questions', zValidator('json', askQuestionSchema), async (c) => {
    const session = store.get(c.req.param('sessionId'));
    if (!session) {
      return c.json(sessionNotFound(), 404);
    }

    const { question, proceed } = c.req.valid('json');
    const outcome = await session.context.ask(question, { proceed });
    return c.json(outcome, OUTCOME_STATUS[outcome.status]);
  });

  /**
   * DELETE /api/sessions/:sessionId
   * End a conversation and drop its history
   */
  sessions.delete('/sessions/:sessionId', (c) => {
    if (!store.delete(c.req.param('sessionId'))) {
      return c.json(sessionNotFound(), 404);
    }
    return c.body(null, 204);
  });

  return sessions;
}
