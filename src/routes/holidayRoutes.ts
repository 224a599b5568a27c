import express, { RequestHandler } from 'express';
import { createHolidayController } from '../controllers/holidayController';

export default (controller: ReturnType<typeof createHolidayController>, protect: RequestHandler) => {
  const router = express.Router();
  router.use(protect);

  router.post('/', controller.markHoliday);
  router.get('/', controller.listHolidays);
  router.delete('/:date', controller.removeHoliday);

  return router;
};
