import { Router } from 'express';
import { needPermissions } from '../middleware/permission.middleware';
import { numericParams, requireJsonContentType } from '../middleware/request.middleware';
import type { RouteDependencies } from '../types/dependencies';
import { ItemTypeController } from './item-type.controller';
import { ItemTypeService } from './item-type.service';

export function createItemTypeRouter(deps: RouteDependencies): Router {
  const router = Router();
  const itemTypeController = new ItemTypeController(new ItemTypeService(deps.records), deps);
  const guard = needPermissions(deps.permissionFactory, { hidden: true });
  const jsonOnly = requireJsonContentType(deps.translator);

  /**
   * @route   GET /itemtypes, /itemtypes/register, /itemtypes/:itemTypeId
   * @desc    Item type register page; id 0 means no item type selected
   * @access  Private (admin roles)
   */
  router.get('/', guard, itemTypeController.index);
  router.get('/register', guard, itemTypeController.index);
  router.get('/:itemTypeId', numericParams('itemTypeId'), guard, itemTypeController.index);

  /**
   * @route   GET /itemtypes/:itemTypeId/render
   * @desc    Render document of an item type, or the empty document
   * @access  Private (admin roles)
   */
  router.get('/:itemTypeId/render', numericParams('itemTypeId'), guard, itemTypeController.render);

  /**
   * @route   POST /itemtypes/register, /itemtypes/:itemTypeId/register
   * @desc    Create (id 0) or update an item type together with its mapping
   * @access  Public
   */
  router.post('/register', jsonOnly, itemTypeController.register);
  router.post('/:itemTypeId/register', numericParams('itemTypeId'), jsonOnly, itemTypeController.register);

  return router;
}
