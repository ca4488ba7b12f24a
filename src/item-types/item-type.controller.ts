import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/error.middleware';
import { pageContext } from '../templates/renderer';
import type { RouteDependencies } from '../types/dependencies';
import { itemTypeIdParamSchema } from './item-type.dto';
import { ItemTypeService } from './item-type.service';

export class ItemTypeController {
  constructor(
    private readonly itemTypeService: ItemTypeService,
    private readonly deps: Pick<RouteDependencies, 'renderer' | 'translator' | 'templates'>
  ) {}

  index = asyncHandler(async (req: Request, res: Response) => {
    const { itemTypeId } = itemTypeIdParamSchema.parse(req.params);
    const lists = await this.itemTypeService.listLatest();

    const html = await this.deps.renderer.render(
      this.deps.templates.register,
      pageContext(req, this.deps.translator, { lists, id: itemTypeId })
    );
    res.send(html);
  });

  render = asyncHandler(async (req: Request, res: Response) => {
    const { itemTypeId } = itemTypeIdParamSchema.parse(req.params);
    const document = await this.itemTypeService.getRender(itemTypeId);

    res.json(document);
  });

  register = asyncHandler(async (req: Request, res: Response) => {
    const { itemTypeId } = itemTypeIdParamSchema.parse(req.params);
    const saved = await this.itemTypeService.register(itemTypeId, req.body);

    res.json({ msg: this.deps.translator.t(req.locale, saved ? 'Success' : 'Fail') });
  });
}
