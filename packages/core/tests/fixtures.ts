import type { ToolDefinition } from '../src/types/index.js'

export const TOOLS: ToolDefinition[] = [
  {
    name: 'get_weather',
    description: 'Get the current weather for a location',
    input_schema: {
      type: 'object',
      properties: {
        city: { type: 'string', description: 'City name' },
      },
    },
  },
  {
    name: 'send_email',
    description: 'Send an email message to a recipient',
    input_schema: {
      type: 'object',
      properties: {
        to: { type: 'string', description: 'Email address' },
        body: { type: 'string', description: 'Email body' },
      },
    },
  },
  {
    name: 'list_files',
    description: 'List files in a directory',
    input_schema: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Directory path' },
      },
    },
  },
  {
    name: 'create_calendar_event',
    description: 'Create a new calendar event with a date and time',
    input_schema: {
      type: 'object',
      properties: {
        title: { type: 'string', description: 'Event title' },
        date: { type: 'string', description: 'Event date' },
      },
    },
  },
]
