import type { AttendanceCollector } from './services/collector.service';
import { parseCollectorInput } from './services/collector.service';
import type { CollectionInputDto } from './types/attendanceType';
import type { AttendanceServer, SocketAck } from './types/socketType';
import { normalizeError } from './middleware/errorMiddleware';
import { verifyAccessToken } from './utils/generateToken';
import { presentStep } from './utils/presenters';

type SocketAuthConfig = Parameters<typeof verifyAccessToken>[1];

// Same envelope as the HTTP surface, delivered through the acknowledgement.
export const handleSocketInput = async (
  collector: AttendanceCollector,
  adminId: string,
  payload: CollectionInputDto,
): Promise<SocketAck> => {
  try {
    const step = await collector.handleInput(adminId, parseCollectorInput(payload ?? {}));
    return { success: true, data: presentStep(step) };
  } catch (err) {
    return { success: false, message: normalizeError(err).message };
  }
};

export const registerSocketHandlers = (
  io: AttendanceServer,
  collector: AttendanceCollector,
  config: SocketAuthConfig,
) => {
  io.use((socket, next) => {
    const token: unknown = socket.handshake.auth.token;
    try {
      if (typeof token !== 'string' || !token) {
        throw new Error('No token provided');
      }
      socket.data.adminId = verifyAccessToken(token, config);
      next();
    } catch (err) {
      next(err instanceof Error ? err : new Error('Unauthorized'));
    }
  });

  io.on('connection', (socket) => {
    const { adminId } = socket.data;
    void socket.join(adminId);

    // resume an open collection after a reconnect
    if (collector.snapshot(adminId)) {
      collector.current(adminId);
    }

    socket.on('attendance:input', (payload, ack) => {
      handleSocketInput(collector, adminId, payload).then((response) => ack?.(response), (err: unknown) => {
        console.error('Socket input failed:', err);
      });
    });

    socket.on('disconnect', () => {
      void socket.leave(adminId);
    });
  });
};
