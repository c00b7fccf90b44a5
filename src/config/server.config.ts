// src/config/server.config.ts
import * as path from 'path';
import { registerAs } from '@nestjs/config';

export default registerAs('server', () => ({
  port: parseInt(process.env.PORT || '8080', 10),
  corsOrigin: process.env.CORS_ORIGIN || '*',
  playerTemplatePath: path.resolve(
    process.env.PLAYER_TEMPLATE_PATH || 'assets/player.html',
  ),
}));
