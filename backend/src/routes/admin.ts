import { Router } from 'express';
import { type AuthControllerDeps, createAuthController } from '../controllers/authController';

/**
 * Admin Routes
 * /admin/*
 */
export function createAdminRoutes(deps: AuthControllerDeps): Router {
  const router = Router();
  const authController = createAuthController(deps);

  // GET /admin
  router.get('/', authController.showPanel);

  // GET /admin/login
  router.get('/login', authController.showLogin);

  // POST /admin/login
  router.post('/login', authController.login);

  // GET /admin/logout
  router.get('/logout', authController.logout);

  return router;
}
