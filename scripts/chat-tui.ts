#!/usr/bin/env node
// Research Desk chat client
// Creates a chat on the running API and streams answers to the terminal

import readline from 'readline';
import { z } from 'zod';

const API_URL = process.env.API_URL || `http://127.0.0.1:${process.env.PORT || 3737}/v1`;

const ChatResponseSchema = z.object({
  chat: z.object({ id: z.string(), title: z.string() }),
});

const EventDataSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  name: z.string().optional(),
  status: z.string().optional(),
  reason: z.string().optional(),
  message: z.string().optional(),
});

type EventData = z.infer<typeof EventDataSchema>;

function drawHeader() {
  console.clear();
  console.log('╔════════════════════════════════════════╗');
  console.log('║            Research Desk               ║');
  console.log('╚════════════════════════════════════════╝');
  console.log(`  API: ${API_URL}`);
  console.log('  Type a question, or "exit" to quit.');
  console.log('');
}

async function createChat(): Promise<string> {
  const response = await fetch(`${API_URL}/chats`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({}),
  });
  if (!response.ok) {
    throw new Error(`Failed to create chat: HTTP ${response.status}`);
  }
  const body = ChatResponseSchema.parse(await response.json());
  return body.chat.id;
}

function render(event: EventData) {
  switch (event.type) {
    case 'tool.start':
      process.stdout.write(`\n  [tool] ${event.name}...`);
      break;
    case 'tool.end':
      process.stdout.write(event.status === 'success' ? ' ok' : ` failed (${event.reason})`);
      break;
    case 'token':
      process.stdout.write(event.text ?? '');
      break;
    case 'footer':
      process.stdout.write(`\n\n${event.text ?? ''}`);
      break;
    case 'error':
      process.stdout.write(`\n[error] ${event.message ?? 'unknown error'}`);
      break;
  }
}

/** Parse `event:` / `data:` blocks out of the response body as it arrives */
async function streamTurn(chatId: string, message: string): Promise<void> {
  const response = await fetch(`${API_URL}/chats/${chatId}/run`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ message }),
  });
  if (!response.ok || !response.body) {
    throw new Error(`Turn failed: HTTP ${response.status}`);
  }

  const decoder = new TextDecoder();
  const reader = response.body.getReader();
  let buffer = '';
  let firstToken = true;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    buffer += decoder.decode(value, { stream: true });

    let boundary = buffer.indexOf('\n\n');
    while (boundary !== -1) {
      const block = buffer.slice(0, boundary);
      buffer = buffer.slice(boundary + 2);
      boundary = buffer.indexOf('\n\n');

      const dataLine = block.split('\n').find(line => line.startsWith('data: '));
      if (!dataLine) continue;

      const parsed = EventDataSchema.safeParse(JSON.parse(dataLine.slice(6)));
      if (!parsed.success) continue;

      if (parsed.data.type === 'token' && firstToken) {
        process.stdout.write('\n\n');
        firstToken = false;
      }
      render(parsed.data);
    }
  }
  process.stdout.write('\n\n');
}

async function main() {
  drawHeader();
  const chatId = await createChat();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const ask = () => new Promise<string>(resolve => rl.question('> ', resolve));

  while (true) {
    const question = (await ask()).trim();
    if (!question) continue;
    if (question === 'exit' || question === 'quit') break;

    try {
      await streamTurn(chatId, question);
    } catch (error) {
      console.log(`\n${error instanceof Error ? error.message : String(error)}\n`);
    }
  }

  rl.close();
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
