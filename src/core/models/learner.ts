/**
 * Learner Domain Types
 */

export interface Learner {
  id: string;
  name: string;
  email: string;
  createdAt: Date;
}

/**
 * Blended mastery of one topic for one learner, in [0, 1].
 * Created on the first quiz submission for the topic.
 */
export interface TopicProficiency {
  learnerId: string;
  topic: string;
  proficiency: number;
  /** Number of quiz attempts blended into `proficiency`. */
  attemptCount: number;
  updatedAt: Date;
}

/** A learner together with their topic → proficiency map. */
export interface LearnerProfile extends Learner {
  topicProficiency: Record<string, number>;
}
