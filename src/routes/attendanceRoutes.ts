import express, { RequestHandler } from 'express';
import { createAttendanceController } from '../controllers/attendanceController';

export default (controller: ReturnType<typeof createAttendanceController>, protect: RequestHandler) => {
  const router = express.Router();
  router.use(protect);

  // Interactive collection
  router.post('/session', controller.startSession);
  router.get('/session', controller.getSession);
  router.post('/session/input', controller.sessionInput);
  router.delete('/session', controller.cancelSession);

  // Direct record management
  router.put('/records', controller.upsertRecord);
  router.get('/records', controller.getRecords);
  router.post('/multiday-absence', controller.markMultidayAbsence);

  return router;
};
