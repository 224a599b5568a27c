import express, { RequestHandler } from 'express';
import { createReportController } from '../controllers/reportController';

export default (controller: ReturnType<typeof createReportController>, protect: RequestHandler) => {
  const router = express.Router();
  router.use(protect);

  router.get('/daily', controller.dailyReport);
  router.get('/date/:date', controller.dateReport);
  router.get('/last-7-days', controller.last7Days);
  router.get('/last-30-days', controller.last30Days);
  router.get('/monthly', controller.monthlyReport);
  router.get('/period', controller.periodReport);
  router.get('/employee/:id', controller.employeeReport);
  router.get('/export', controller.exportReport);

  return router;
};
