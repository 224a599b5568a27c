import type { CollectorPrompt, InteractionChannel } from '../types/collectorType';
import type { AttendanceServer } from '../types/socketType';
import { presentPrompt } from './presenters';

// Every admin socket joins a room named after the admin id.
export const adminRoom = (io: AttendanceServer | undefined, adminId: string) =>
  io && adminId ? io.to(adminId) : undefined;

export class SocketInteractionChannel implements InteractionChannel {
  private io?: AttendanceServer;

  attach(io: AttendanceServer) {
    this.io = io;
  }

  prompt(adminId: string, prompt: CollectorPrompt) {
    adminRoom(this.io, adminId)?.emit('attendance:prompt', presentPrompt(prompt));
  }

  notify(adminId: string, message: string) {
    adminRoom(this.io, adminId)?.emit('attendance:notice', { message });
  }
}
