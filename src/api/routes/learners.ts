/**
 * Learner API Routes
 *
 * Endpoints:
 * - POST /                 - Register a learner
 * - GET  /:id              - Learner with their topic → proficiency map
 * - GET  /:id/proficiency  - Per-topic proficiency rows, sorted by topic
 *
 * These routes are not learner-scoped: registration happens before a
 * learner id exists.
 */

import { Hono } from 'hono';
import type { LearnerProfile } from '@/core/models';
import { generateId } from '@/core/learning';
import { NotFoundError } from '@/core/errors';
import type { LearnerRepository, TopicProficiencyRepository } from '@/storage/repositories';
import { validate } from '../middleware/validate';
import { createLearnerSchema } from '../types';
import { success } from '../utils/response';

export interface LearnerRouteDependencies {
  learnerRepo: LearnerRepository;
  topicProficiencyRepo: TopicProficiencyRepository;
}

export function learnersRoutes({ learnerRepo, topicProficiencyRepo }: LearnerRouteDependencies): Hono {
  const router = new Hono();

  /**
   * POST /
   *
   * Response: 201 with the learner; 409 CONFLICT if the email is taken.
   */
  router.post('/', validate(createLearnerSchema), async (c) => {
    const body = c.get('validatedBody');
    const learner = await learnerRepo.create({
      id: generateId('lr'),
      name: body.name,
      email: body.email,
    });
    return success(c, learner, 201);
  });

  router.get('/:id', async (c) => {
    const id = c.req.param('id');
    const learner = await learnerRepo.findById(id);
    if (!learner) {
      throw new NotFoundError('Learner', id);
    }

    const profile: LearnerProfile = {
      ...learner,
      topicProficiency: await topicProficiencyRepo.getProficiencyMap(id),
    };
    return success(c, profile);
  });

  router.get('/:id/proficiency', async (c) => {
    const id = c.req.param('id');
    const learner = await learnerRepo.findById(id);
    if (!learner) {
      throw new NotFoundError('Learner', id);
    }

    const rows = await topicProficiencyRepo.findByLearner(id);
    return success(
      c,
      rows.map(({ topic, proficiency, attemptCount, updatedAt }) => ({
        topic,
        proficiency,
        attemptCount,
        updatedAt,
      }))
    );
  });

  return router;
}
