import express from 'express';
import { createAuthController } from '../controllers/authController';

export default (controller: ReturnType<typeof createAuthController>) => {
  const router = express.Router();

  router.post('/login', controller.login);
  router.post('/logout', controller.logout);

  return router;
};
