import express from 'express';
import * as hostsController from '../controllers/hosts';
import { apiLimiter, wakeLimiter } from '../middleware/rateLimiter';
import { validateRequest } from '../middleware/validateRequest';
import {
  addHostSchema,
  hostIdParamSchema,
  updateHostSchema,
  wakeHostSchema,
} from '../validators/hostValidator';

const router = express.Router();

// Apply general API rate limiter to all routes
router.use(apiLimiter);

// List all hosts with their latest polled status
router.get('/', hostsController.getAllHosts);

// Add a new host (MAC resolved from ARP when omitted)
router.post('/', validateRequest(addHostSchema, 'body'), hostsController.addHost);

// Wake any MAC address directly; registered before '/:id' routes
router.post('/wake', wakeLimiter, validateRequest(wakeHostSchema, 'body'), hostsController.wakeHost);

// Get a specific host
router.get('/:id', validateRequest(hostIdParamSchema, 'params'), hostsController.getHost);

// Wake a registered host
router.post(
  '/:id/wake',
  wakeLimiter,
  validateRequest(hostIdParamSchema, 'params'),
  hostsController.wakeHostById
);

// Update a specific host
router.put(
  '/:id',
  validateRequest(hostIdParamSchema, 'params'),
  validateRequest(updateHostSchema, 'body'),
  hostsController.updateHost
);

// Delete a specific host
router.delete('/:id', validateRequest(hostIdParamSchema, 'params'), hostsController.deleteHost);

export default router;
