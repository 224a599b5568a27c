import type { Server } from 'socket.io';
import type { CollectionInputDto } from './attendanceType';
import type { ApiResponse } from './typedResponse';
import type { presentPrompt, presentStep } from '../utils/presenters';

export type SocketAck = ApiResponse<ReturnType<typeof presentStep>>;

export interface ServerToClientEvents {
  'attendance:prompt': (prompt: ReturnType<typeof presentPrompt>) => void;
  'attendance:notice': (notice: { message: string }) => void;
}

export interface ClientToServerEvents {
  'attendance:input': (payload: CollectionInputDto, ack?: (response: SocketAck) => void) => void;
}

export interface SocketData {
  adminId: string;
}

type InterServerEvents = Record<string, never>;

export type AttendanceServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
