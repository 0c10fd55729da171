import type { Concept, Topic } from '@coursewright/shared';

// Substrings that identify each learning path request in routedGateway().
export const SEARCH_MATCH = 'highly authoritative URLs';
export const SKELETON_MATCH = 'hierarchical learning path structure';
export const SUMMARY_MATCH = 'detailed summary of the key academic points';
export const detailsMatch = (topicName: string) => `details for the IIT-JEE topic "${topicName}"`;
export const conceptMatch = (conceptName: string) => `content for the concept "${conceptName}"`;

export const SOURCE_URL = 'https://physics.example.edu/rotation';
export const SOURCE_SUMMARY = 'Torque equals r cross F. Angular momentum is conserved without external torque.';

const emptyConcept = (concept_name: string): Concept => ({
  concept_name,
  reading_material: '',
  mcqs: [],
});

export const SKELETON_TOPICS: Topic[] = [
  {
    topic_name: 'Torque',
    prerequisites: [],
    problem_solving_tips: [],
    common_pitfalls: [],
    concepts: [emptyConcept('Moment of a force')],
  },
  {
    topic_name: 'Angular Momentum',
    prerequisites: [],
    problem_solving_tips: [],
    common_pitfalls: [],
    concepts: [emptyConcept('Conservation of angular momentum')],
  },
];

export const SKELETON_JSON = JSON.stringify({ 'Rotational Motion': SKELETON_TOPICS });

export const TOPIC_DETAILS = {
  prerequisites: ['Vector cross product'],
  problem_solving_tips: ['Choose the axis before writing torque equations'],
  common_pitfalls: ['Forgetting the sign of clockwise torque'],
};

export const CONCEPT_CONTENT = {
  reading_material: 'Torque is the rotational analogue of force.',
  mcqs: [
    {
      question: 'What is the SI unit of torque?',
      options: ['N m', 'N', 'J/s', 'kg m/s'],
      correct_answer_index: 0,
      explanation: 'Torque is force times lever arm.',
    },
  ],
};

export const VALID_MCQ = {
  question: 'A ball is thrown horizontally from a 20 m cliff. How long is it in the air? (g = 10 m/s^2)',
  options: { A: '1 s', B: '2 s', C: '3 s', D: '4 s' },
  correct_answer: 'B',
  explanation: 'h = g t^2 / 2 gives t = 2 s. The horizontal speed does not matter.',
};

export const VALID_METADATA = {
  subject: 'Physics',
  difficulty: 'medium',
  tags: ['projectile motion', 'kinematics'],
};

// Substrings of the question workflow system prompts.
export const MCQ_MATCH = 'expert question creator';
export const METADATA_MATCH = 'extracts structured metadata';
