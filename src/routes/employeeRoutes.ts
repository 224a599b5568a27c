import express, { RequestHandler } from 'express';
import { createEmployeeController } from '../controllers/employeeController';

export default (controller: ReturnType<typeof createEmployeeController>, protect: RequestHandler) => {
  const router = express.Router();
  router.use(protect);

  router.post('/', controller.addEmployee);
  router.get('/', controller.listEmployees);
  router.delete('/:id', controller.removeEmployee);

  return router;
};
