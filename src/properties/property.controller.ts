import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/error.middleware';
import { pageContext } from '../templates/renderer';
import type { RouteDependencies } from '../types/dependencies';
import { propertyIdParamSchema } from './property.dto';
import { PropertyService } from './property.service';

export class PropertyController {
  constructor(
    private readonly propertyService: PropertyService,
    private readonly deps: Pick<RouteDependencies, 'renderer' | 'translator' | 'templates'>
  ) {}

  customProperty = asyncHandler(async (req: Request, res: Response) => {
    const lists = await this.propertyService.listProperties();

    const html = await this.deps.renderer.render(
      this.deps.templates.property,
      pageContext(req, this.deps.translator, { lists })
    );
    res.send(html);
  });

  getPropertyList = asyncHandler(async (_req: Request, res: Response) => {
    const lists = await this.propertyService.getPropertyMap();

    res.json(lists);
  });

  getProperty = asyncHandler(async (req: Request, res: Response) => {
    const { propertyId } = propertyIdParamSchema.parse(req.params);
    const property = await this.propertyService.getProperty(propertyId);

    res.json(property);
  });

  saveProperty = asyncHandler(async (req: Request, res: Response) => {
    const { propertyId } = propertyIdParamSchema.parse(req.params);
    const saved = await this.propertyService.save(propertyId, req.body);

    res.json({ msg: this.deps.translator.t(req.locale, saved ? 'Success' : 'Fail') });
  });
}
