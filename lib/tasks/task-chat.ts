// Veloce Task Chat
// Per-task conversation with a deliberate "thinking" pause before each reply

import type { AIProvider } from '../ai/ai-provider';
import { defaultChatReply } from '../ai/ai-provider';
import type { ChatTurn, PromptTask } from '../ai/prompts';
import { getConfig } from '../config/env';
import { describeError, logger, systemContext } from '../logger';
import { generateId, getISOTimestamp } from '../utils';

export interface ChatMessage extends ChatTurn {
    id: string;
    timestamp: string;
}

export interface TaskChatOptions {
    responder?: Pick<AIProvider, 'chat'>;
    delayMs?: number; // defaults to CHAT_RESPONSE_DELAY_MS
}

export class TaskChatSession {
    readonly messages: ChatMessage[] = [];
    isThinking = false;

    private readonly task: PromptTask & { id?: string };
    private readonly responder?: Pick<AIProvider, 'chat'>;
    private readonly delayMs: number;

    constructor(task: PromptTask & { id?: string }, options: TaskChatOptions = {}) {
        this.task = task;
        this.responder = options.responder;
        this.delayMs = options.delayMs ?? getConfig().ai.chatResponseDelayMs;
    }

    /**
     * Appends the user message, waits, then appends the assistant reply.
     * Returns the reply, or null when the input was blank.
     */
    async send(text: string): Promise<ChatMessage | null> {
        const content = text.trim();
        if (!content) return null;

        const history: ChatTurn[] = this.messages.map(({ role, content: turn }) => ({ role, content: turn }));
        this.messages.push(this.message('user', content));
        this.isThinking = true;

        try {
            const [reply] = await Promise.all([this.reply(history, content), sleep(this.delayMs)]);
            const message = this.message('assistant', reply);
            this.messages.push(message);
            return message;
        } finally {
            this.isThinking = false;
        }
    }

    private async reply(history: ChatTurn[], content: string): Promise<string> {
        const fallback = defaultChatReply(this.task.title);
        if (!this.responder) return fallback;

        try {
            const answer = await this.responder.chat(this.task, history, content);
            return answer || fallback;
        } catch (error) {
            logger.warn('LOG.CHAT_FALLBACK', { error: describeError(error) }, systemContext('chat', { taskId: this.task.id }));
            return fallback;
        }
    }

    private message(role: ChatMessage['role'], content: string): ChatMessage {
        return { id: generateId(), role, content, timestamp: getISOTimestamp() };
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
