/**
 * Employee Routes Module
 *
 * @module routes/employee
 */

import { Router } from 'express';

import { employeeController } from '../controllers/employee.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { requireManager } from '../middleware/authorize.js';
import { uploadCsv } from '../middleware/upload.js';

export function createEmployeeRouter(): Router {
  const router = Router();

  router.use(authenticate);

  /**
   * GET /api/employees
   *
   * Authorization: Manager (all employees), Supervisor (own employees)
   */
  router.get('/', employeeController.listEmployees.bind(employeeController));

  /**
   * POST /api/employees/import
   *
   * Multipart form, field `file`: CSV rows of name, code, supervisor email.
   *
   * Response data: { created, errors: [{ row, message }] }
   */
  router.post('/import', requireManager, uploadCsv('file'), employeeController.importEmployees.bind(employeeController));

  router.post('/', requireManager, employeeController.createEmployee.bind(employeeController));
  router.put('/:id', requireManager, employeeController.updateEmployee.bind(employeeController));
  router.delete('/:id', requireManager, employeeController.deleteEmployee.bind(employeeController));

  return router;
}

export const employeeRouter = createEmployeeRouter();

export default employeeRouter;
