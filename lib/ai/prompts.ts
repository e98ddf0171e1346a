// Veloce AI Prompts
// Copy-ready task prompts for external assistants, plus the prompts
// the provider adapters send for analysis, estimation and brain dumps

import { TASK_TYPES } from '../constants';
import type { Task } from '../schema';
import { formatEstimate, priorityFromStars } from '../tasks/task-model';

export const PROMPT_STYLES = {
  detailed: { label: 'Detailed', description: 'Step-by-step breakdown with time estimates' },
  quick: { label: 'Quick', description: 'Concise action items' },
  creative: { label: 'Creative', description: 'Novel approaches and ideas' },
  coach: { label: 'Coach', description: 'Motivational support' },
} as const;

export type PromptStyle = keyof typeof PROMPT_STYLES;

export const PROMPT_STYLE_KEYS: ReadonlyArray<PromptStyle> = ['detailed', 'quick', 'creative', 'coach'];

export const PROMPT_PREVIEW_LENGTH = 150;

export type PromptTask = Pick<Task, 'title' | 'starRating' | 'taskType' | 'estimatedMinutes' | 'aiAdvice' | 'notes'>;

interface PromptInputs {
  title: string;
  priority: string;
  taskType: string;
  estimatedTime: string;
  description: string;
}

function promptInputs(task: PromptTask): PromptInputs {
  return {
    title: task.title,
    priority: priorityFromStars(task.starRating),
    taskType: TASK_TYPES[task.taskType].displayName,
    estimatedTime: formatEstimate(task) ?? 'unspecified duration',
    description: task.aiAdvice ?? task.notes ?? '',
  };
}

// Optional lines drop out entirely when empty
function lines(...parts: Array<string | null>): string {
  return parts.filter((part): part is string => part !== null).join('\n');
}

/**
 * Builds one of the four copyable prompts for a task.
 */
export function buildTaskPrompt(task: PromptTask, style: PromptStyle): string {
  const { title, priority, taskType, estimatedTime, description } = promptInputs(task);
  const hasDescription = description.length > 0;

  switch (style) {
    case 'detailed':
      return lines(
        `I need to complete a task: "${title}"`,
        '',
        'Context:',
        `- Type: ${taskType} task`,
        `- Priority: ${priority}`,
        `- Estimated time: ${estimatedTime}`,
        hasDescription ? `- Additional context: ${description}` : null,
        '',
        'Please help me by:',
        '1. Breaking this into smaller, actionable steps (each under 30 minutes)',
        '2. Providing a time estimate for each step',
        '3. Suggesting the best order to complete them',
        '4. Identifying any potential blockers or prerequisites',
        '5. Recommending the optimal time of day for each step',
        '',
        'Format your response as a numbered checklist I can follow.'
      );

    case 'quick':
      return lines(
        'Quick task breakdown needed:',
        '',
        `Task: "${title}" (${priority} priority, ${taskType})`,
        '',
        'Give me 3-5 concise action items to complete this. Keep each under one sentence. No explanations needed.'
      );

    case 'creative':
      return lines(
        `I'm working on: "${title}"`,
        '',
        `This is a ${taskType} task with ${priority} priority.`,
        hasDescription ? `Context: ${description}` : null,
        '',
        'Please suggest:',
        '1. Three unconventional approaches I might not have considered',
        '2. Creative ways to make this task more engaging',
        '3. How I could turn this into a learning opportunity',
        '4. Any innovative tools or techniques that could help',
        '',
        'Think outside the box!'
      );

    case 'coach':
      return lines(
        'I need some motivation and guidance for this task:',
        '',
        `"${title}"`,
        '',
        `Priority: ${priority}`,
        `Type: ${taskType}`,
        hasDescription ? `What I know: ${description}` : null,
        '',
        'Please:',
        '1. Help me understand why this task matters',
        '2. Identify what might be holding me back',
        '3. Suggest a tiny first step I can take right now (under 2 minutes)',
        '4. Give me an encouraging perspective on completing this',
        '5. Share a relevant productivity insight or technique',
        '',
        'Be warm and supportive in your response.'
      );
  }
}

export function promptPreview(prompt: string): string {
  return prompt.length > PROMPT_PREVIEW_LENGTH
    ? `${prompt.substring(0, PROMPT_PREVIEW_LENGTH)}...`
    : prompt;
}

// ============================================
// Provider prompts
// ============================================

export const JSON_ONLY_INSTRUCTION =
  'IMPORTANT: Respond ONLY with valid JSON. No markdown, no code blocks, just the raw JSON object.';

/** Suffix appended to every prompt that expects a JSON reply */
export function withJsonInstruction(prompt: string): string {
  return `${prompt}\n\n${JSON_ONLY_INSTRUCTION}`;
}

export function getAnalyzeTaskPrompt(title: string, notes?: string, context?: string): string {
  return lines(
    'You are a productivity expert. Analyze this task and provide helpful advice.',
    '',
    `Task: ${title}`,
    notes ? `Notes: ${notes}` : null,
    context ? `Context: ${context}` : null,
    '',
    'Provide:',
    '1. Brief, actionable advice (2-3 sentences)',
    '2. Priority level (low, medium, high) based on typical urgency',
    '3. Estimated time in minutes (be realistic)',
    '4. Your thought process explaining your reasoning',
    '5. 3-5 sub-tasks to break this down (if applicable)',
    '6. YouTube search queries that would help learn skills for this task',
    '',
    'Respond in this exact JSON format:',
    `{
    "advice": "Your actionable advice here",
    "priority": "medium",
    "estimated_minutes": 45,
    "thought_process": "Brief explanation of your reasoning",
    "sub_tasks": [
        {"title": "First step", "estimated_minutes": 10, "reasoning": "Why this step"}
    ],
    "youtube_resources": [
        {"search_query": "how to X tutorial", "relevance_score": 0.9, "reasoning": "Why helpful"}
    ],
    "schedule_suggestion": {
        "suggested_time_of_day": "morning",
        "reasoning": "Best time because...",
        "energy_level": "high",
        "optimal_duration": 45
    }
}`
  );
}

export function getPriorityPrompt(title: string): string {
  return `Assess the priority of this task based on typical urgency and importance.
Task: ${title}

Respond with ONLY one word: low, medium, or high`;
}

export function getEstimatePrompt(title: string, context?: string): string {
  return lines(
    'Estimate how many minutes this task would take for an average person.',
    `Task: ${title}`,
    context ? `Context: ${context}` : null,
    '',
    'Respond with ONLY a number (minutes). Be realistic. Examples:',
    '- Simple email: 10',
    '- Report writing: 60',
    '- Major project: 240',
    '',
    'Your answer (just the number):'
  );
}

export function getBrainDumpPrompt(text: string): string {
  return `You are analyzing a brain dump - unstructured thoughts from someone clearing their mental load.

Your job is to extract actionable tasks and understand the emotional context.

RULES:
1. Extract ONLY actionable items (things that can be done)
2. Write task titles as clear actions (verb + object)
3. Estimate time REALISTICALLY - add 40% buffer because humans underestimate
4. Detect priority from urgency cues ("need to", "must", "deadline", "asap" = high)
5. Note any emotional undertones (stress, overwhelm, avoidance, excitement)
6. Identify people mentioned who could help
7. Be warm and observant, not clinical

INPUT:
${text}

Respond ONLY with valid JSON in this exact format:
{
  "tasks": [
    {
      "title": "Clear action title",
      "estimatedMinutes": 30,
      "priority": "high|medium|low",
      "category": "work|personal|health|finance|social|other",
      "suggestion": "Optional helpful tip or way to make this easier",
      "relatedPerson": "Name if someone was mentioned",
      "dueContext": "Monday|this week|soon|null"
    }
  ],
  "overall_mood": "Brief description of emotional state detected",
  "gentle_observation": "One caring, insightful observation about what you noticed",
  "detected_themes": ["theme1", "theme2"]
}

If no actionable tasks found, return empty tasks array.
Be empathetic in your observation - you're a supportive friend, not a robot.`;
}

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export function getChatPrompt(task: PromptTask, history: ChatTurn[], message: string): string {
  const { title, priority, taskType, estimatedTime, description } = promptInputs(task);
  const transcript = history.map((turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.content}`);

  return lines(
    'You are a supportive productivity coach helping someone make progress on a single task.',
    '',
    `Task: "${title}" (${priority} priority, ${taskType}, ${estimatedTime})`,
    description ? `Context: ${description}` : null,
    '',
    transcript.length > 0 ? `Conversation so far:\n${transcript.join('\n')}\n` : null,
    `User: ${message}`,
    '',
    'Reply in 2-4 short sentences. Suggest the smallest next action when the user seems stuck.'
  );
}
