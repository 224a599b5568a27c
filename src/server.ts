import mongoose from 'mongoose';
import dotenv from 'dotenv';
import http from 'http';
import { Server } from 'socket.io';
import { createApp } from './app';
import { scheduleSessionSweep } from './jobs/expireSessions';
import { createMemoryRepositories } from './repositories/memoryRepositories';
import { createMongoRepositories } from './repositories/mongoRepositories';
import type { Repositories } from './repositories/types';
import { createServices } from './services';
import { registerSocketHandlers } from './socket';
import type { AttendanceServer } from './types/socketType';
import { AppConfig, loadConfig } from './utils/config';
import { SocketInteractionChannel } from './utils/socketEmitter';

dotenv.config();

const connectStore = async (config: AppConfig): Promise<Repositories> => {
  if (!config.mongoUri) {
    console.log('MONGO_URI not set, using the in-memory store');
    return createMemoryRepositories();
  }

  await mongoose.connect(config.mongoUri);
  console.log('Connected to MongoDB');
  return createMongoRepositories();
};

const start = async () => {
  const config = loadConfig();
  if (!config.adminPasswordHash) {
    console.warn('ADMIN_PASSWORD_HASH not set, password login is disabled');
  }

  const repos = await connectStore(config);
  const channel = new SocketInteractionChannel();
  const services = createServices(repos, channel, config);

  const app = createApp(services, config);
  const server = http.createServer(app);
  const io: AttendanceServer = new Server(server, {
    cors: {
      origin: config.frontendUrl ? [config.frontendUrl] : [],
      credentials: true,
    },
  });

  channel.attach(io);
  registerSocketHandlers(io, services.collector, config);
  scheduleSessionSweep(services.collector, config.sessionSweepCron);

  // Start server
  server.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
  });
};

start().catch((err) => {
  console.error('Error starting server:', err);
  process.exit(1);
});
