// Veloce Tasks Route
// Task CRUD over the in-memory store

import { NextResponse, type NextRequest } from 'next/server';
import { z } from 'zod';
import { errorResponse, parseBody } from '@/lib/api/http';
import { tasksDB } from '@/lib/db';
import { systemContext } from '@/lib/logger';
import { classifyTaskType } from '@/lib/tasks/classifier';
import { createTask } from '@/lib/tasks/task-model';

const newTaskSchema = z.object({
    title: z.string().trim().min(1),
    notes: z.string().optional(),
    starRating: z.number().int().min(1).max(3).optional(),
    taskType: z.enum(['create', 'communicate', 'consume', 'coordinate']).optional(),
    estimatedMinutes: z.number().int().positive().optional(),
    scheduledTime: z.string().datetime({ offset: true }).optional(),
    recurringType: z.enum(['once', 'daily', 'weekdays', 'weekly', 'biweekly', 'monthly', 'custom']).optional(),
    recurringDays: z.array(z.number().int().min(0).max(6)).optional(),
    recurringEndDate: z.string().datetime({ offset: true }).optional(),
});

// GET: pending tasks, or everything with ?all=true
export async function GET(request: NextRequest) {
    const all = request.nextUrl.searchParams.get('all') === 'true';
    const tasks = all ? await tasksDB.getAll() : await tasksDB.getPending();
    return NextResponse.json({ result: tasks });
}

// POST: create a task; the type is inferred from the title when omitted
export async function POST(request: NextRequest) {
    const context = systemContext('tasks');
    try {
        const input = await parseBody(request, newTaskSchema);
        const task = createTask({ ...input, taskType: input.taskType ?? classifyTaskType(input.title) });
        return NextResponse.json({ result: await tasksDB.create(task) }, { status: 201 });
    } catch (error) {
        return errorResponse(error, context);
    }
}
