import express from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import { createAttendanceController } from './controllers/attendanceController';
import { createAuthController } from './controllers/authController';
import { createEmployeeController } from './controllers/employeeController';
import { createHolidayController } from './controllers/holidayController';
import { createReportController } from './controllers/reportController';
import { protect } from './middleware/auth.middleware';
import { ErrorMiddleware } from './middleware/errorMiddleware';
import attendanceRoutes from './routes/attendanceRoutes';
import authRoutes from './routes/auth.routes';
import employeeRoutes from './routes/employeeRoutes';
import holidayRoutes from './routes/holidayRoutes';
import reportRoutes from './routes/reportRoutes';
import type { Services } from './services';
import type { AppConfig } from './utils/config';

export const createApp = (services: Services, config: AppConfig, now: () => Date = () => new Date()) => {
  const app = express();
  app.use(express.json());
  app.use(cookieParser());

  const allowedOrigins = config.frontendUrl ? [config.frontendUrl] : [];
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin) {
          return callback(null, true);
        }
        if (allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        return callback(new Error(`Origin ${origin} not allowed by CORS`), false);
      },
      credentials: true,
    }),
  );

  const guard = protect(config);

  app.get('/health', (_req, res) => {
    res.status(200).json({ success: true, data: { status: 'ok', activeSessions: services.collector.activeSessions } });
  });

  // Routes
  app.use('/api/auth', authRoutes(createAuthController(config)));
  app.use('/api/employees', employeeRoutes(createEmployeeController(services), guard));
  app.use('/api/attendance', attendanceRoutes(createAttendanceController(services, config, now), guard));
  app.use('/api/reports', reportRoutes(createReportController(services, now), guard));
  app.use('/api/holidays', holidayRoutes(createHolidayController(services, now), guard));

  // 🚨 Error Handling Middleware
  app.use(ErrorMiddleware);

  return app;
};
