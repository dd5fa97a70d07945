import { z } from 'zod';
import { ToolInvocationError } from '../errors';
import type { ToolDefinition, ToolResponse } from './toolRegistry';

export const SCHEDULE_MEETING_TOOL = 'schedule_meeting';

export const ScheduleMeetingArgsSchema = z.object({
  name: z.string().trim().min(1),
  email: z.string().trim().email(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  meeting_time: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM (24h)'),
  title: z.string().trim().min(1).optional(),
  duration: z.coerce.number().int().positive().max(480).default(30),
});

export type ScheduleMeetingArgs = z.infer<typeof ScheduleMeetingArgsSchema>;

const DEFAULT_TITLE = 'Meeting';

async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

export function createScheduleMeetingTool(
  webhookUrl: string | undefined,
): ToolDefinition<typeof ScheduleMeetingArgsSchema> {
  return {
    name: SCHEDULE_MEETING_TOOL,
    description:
      'Schedule a meeting for the caller. Collect their name, email, date, and time before calling.',
    parameters: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Full name of the attendee' },
        email: { type: 'string', description: 'Email address for the invitation' },
        date: { type: 'string', description: 'Meeting date as YYYY-MM-DD' },
        meeting_time: { type: 'string', description: 'Start time as HH:MM in 24 hour format' },
        title: { type: 'string', description: 'Short meeting title' },
        duration: { type: 'integer', description: 'Length in minutes, defaults to 30' },
      },
      required: ['name', 'email', 'date', 'meeting_time'],
    },
    schema: ScheduleMeetingArgsSchema,
    handler: async (args, signal): Promise<ToolResponse> => {
      if (!webhookUrl) {
        throw new ToolInvocationError('scheduling_unavailable');
      }

      const title = args.title ?? DEFAULT_TITLE;
      const response = await fetch(webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          name: args.name,
          email: args.email,
          date: args.date,
          time: args.meeting_time,
          title,
          duration_minutes: args.duration,
        }),
        signal,
      });

      if (!response.ok) {
        const body = await readResponseText(response);
        const preview = body.length > 200 ? `${body.slice(0, 200)}...` : body;
        throw new ToolInvocationError(`scheduling webhook failed ${response.status}: ${preview}`);
      }

      return {
        success: true,
        message: `Your meeting "${title}" is scheduled for ${args.date} at ${args.meeting_time}.`,
      };
    },
  };
}
