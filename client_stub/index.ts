import readline from 'readline';
import WebSocket from 'ws';

// Text-mode client: stdin lines become utterances, speech is printed and acked.
const url = process.argv[2] ?? 'ws://localhost:8080/ws';

const ws = new WebSocket(url);

ws.on('open', () => {
  console.log(`connected to ${url}; type a command (who, what do you see, read the sign, exit)`);
  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  rl.on('line', (line) => {
    const text = line.trim();
    if (!text) return;
    ws.send(JSON.stringify({ type: 'utterance', text }));
  });
  rl.on('close', () => ws.close());
});

ws.on('message', (data) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data.toString());
  } catch {
    console.log('<<', data.toString());
    return;
  }
  if (isSpeech(parsed)) {
    console.log(`>> ${parsed.text}`);
    ws.send(JSON.stringify({ type: 'speech_done', id: parsed.id }));
    return;
  }
  console.log('<<', parsed);
});

ws.on('close', () => {
  console.log('WebSocket closed');
  process.exit(0);
});

ws.on('error', (error) => {
  console.error('WebSocket error', error);
  process.exit(1);
});

function isSpeech(message: unknown): message is { type: 'speech'; id: string; text: string } {
  if (typeof message !== 'object' || message === null) return false;
  return (
    'type' in message &&
    message.type === 'speech' &&
    'id' in message &&
    typeof message.id === 'string' &&
    'text' in message &&
    typeof message.text === 'string'
  );
}
