import { Router } from 'express';
import { numericParams, requireJsonContentType } from '../middleware/request.middleware';
import type { RouteDependencies } from '../types/dependencies';
import { MappingController } from './mapping.controller';
import { MappingService } from './mapping.service';

export function createMappingRouter(deps: RouteDependencies): Router {
  const router = Router();
  const mappingController = new MappingController(new MappingService(deps.records), deps);

  /**
   * @route   GET /itemtypes/mapping, /itemtypes/mapping/:itemTypeId
   * @desc    Mapping page; unknown ids redirect to the first item type
   * @access  Public
   */
  router.get('/', mappingController.mappingIndex);
  router.get('/:itemTypeId', numericParams('itemTypeId'), mappingController.mappingIndex);

  /**
   * @route   POST /itemtypes/mapping
   * @desc    Store a mapping sent as { item_type_id, mapping: "<json>" }
   * @access  Public
   */
  router.post('/', requireJsonContentType(deps.translator), mappingController.mappingRegister);

  return router;
}
