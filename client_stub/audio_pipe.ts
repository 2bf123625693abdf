import WebSocket from 'ws';

// Pipes raw 16-bit PCM from stdin to the server for Deepgram transcription.
const url = process.argv[2] ?? 'ws://localhost:8080/ws';
const sampleRate = Number(process.argv[3] ?? 16000);
const chunkMs = Number(process.argv[4] ?? 20);

const bytesPerSample = 2;
const bytesPerMs = (sampleRate * bytesPerSample) / 1000;
const chunkBytes = Math.max(1, Math.floor(bytesPerMs * chunkMs));

const ws = new WebSocket(url);

let tMs = 0;
let buffer = Buffer.alloc(0);
let ready = false;
let ended = false;

ws.on('open', () => {
  ready = true;
});

ws.on('message', (data) => {
  console.log('<<', data.toString());
});

ws.on('close', () => {
  process.exit(0);
});

ws.on('error', (error) => {
  console.error('WebSocket error', error);
  process.exit(1);
});

process.stdin.on('data', (chunk: Buffer) => {
  buffer = Buffer.concat([buffer, chunk]);
  while (buffer.length >= chunkBytes && ready) {
    const slice = buffer.subarray(0, chunkBytes);
    buffer = buffer.subarray(chunkBytes);
    ws.send(
      JSON.stringify({
        type: 'audio_chunk',
        pcm16_base64: slice.toString('base64'),
        sampleRate,
        t_ms: tMs
      })
    );
    tMs += chunkMs;
  }
});

process.stdin.on('end', () => {
  ended = true;
});

process.stdin.on('error', (error) => {
  console.error('stdin error', error);
});

setInterval(() => {
  if (ready && ended && buffer.length === 0) {
    ws.close();
  }
}, 500);
