// src/config/trello.config.ts
import { registerAs } from '@nestjs/config';

export default registerAs('trello', () => ({
  apiUrl: process.env.TRELLO_API_URL || 'https://api.trello.com/1',
  apiKey: process.env.TRELLO_API_KEY || '',
  token: process.env.TRELLO_TOKEN || '',
  boardName: process.env.TRELLO_BOARD_NAME || '',
  lists: {
    queue: process.env.TRELLO_QUEUE_LIST || 'Queue',
    nowPlaying: process.env.TRELLO_NOW_PLAYING_LIST || 'Now Playing',
    played: process.env.TRELLO_PLAYED_LIST || 'Played',
    failed: process.env.TRELLO_FAILED_LIST || 'Failed',
  },
  requestTimeoutMs: 15000,
}));
