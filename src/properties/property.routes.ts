import { Router } from 'express';
import { needPermissions } from '../middleware/permission.middleware';
import { numericParams, requireJsonContentType } from '../middleware/request.middleware';
import type { RouteDependencies } from '../types/dependencies';
import { PropertyController } from './property.controller';
import { PropertyService } from './property.service';

export function createPropertyRouter(deps: RouteDependencies): Router {
  const router = Router();
  const propertyController = new PropertyController(new PropertyService(deps.records), deps);
  const guard = needPermissions(deps.permissionFactory, { hidden: true });
  const jsonOnly = requireJsonContentType(deps.translator);

  /**
   * @route   GET /itemtypes/property
   * @desc    Property definitions page
   * @access  Private (admin roles)
   */
  router.get('/', guard, propertyController.customProperty);

  /**
   * @route   GET /itemtypes/property/list
   * @desc    All property definitions keyed by id
   * @access  Private (admin roles)
   */
  router.get('/list', guard, propertyController.getPropertyList);

  /**
   * @route   GET /itemtypes/property/:propertyId
   * @desc    One property definition
   * @access  Private (admin roles)
   */
  router.get('/:propertyId', numericParams('propertyId'), guard, propertyController.getProperty);

  /**
   * @route   POST /itemtypes/property, /itemtypes/property/:propertyId
   * @desc    Create or update a property definition
   * @access  Public
   */
  router.post('/', jsonOnly, propertyController.saveProperty);
  router.post('/:propertyId', numericParams('propertyId'), jsonOnly, propertyController.saveProperty);

  return router;
}
