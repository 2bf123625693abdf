import fs from 'fs/promises';
import path from 'path';
import WebSocket from 'ws';

const url = process.argv[2] ?? 'ws://localhost:8080/ws';
const imagePath = process.argv[3];
const intervalMs = Number(process.argv[4] ?? 500);

if (!imagePath) {
  console.error('Usage: tsx client_stub/frame_sender.ts <wsUrl> <imagePath> [intervalMs]');
  process.exit(1);
}

const mime = path.extname(imagePath).toLowerCase() === '.png' ? 'image/png' : 'image/jpeg';
const ws = new WebSocket(url);

// Re-sends the same picture so the push frame source always has a fresh frame.
ws.on('open', () => {
  fs.readFile(imagePath)
    .then((data) => {
      const image_base64 = data.toString('base64');
      const send = () => ws.send(JSON.stringify({ type: 'frame', image_base64, mime }));
      send();
      setInterval(send, intervalMs);
    })
    .catch((error: unknown) => {
      console.error('cannot read image', error);
      process.exit(1);
    });
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
