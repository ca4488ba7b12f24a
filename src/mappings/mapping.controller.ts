import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/error.middleware';
import { pageContext } from '../templates/renderer';
import type { RouteDependencies } from '../types/dependencies';
import { mappingItemTypeParamSchema } from './mapping.dto';
import { MappingService } from './mapping.service';

export class MappingController {
  constructor(
    private readonly mappingService: MappingService,
    private readonly deps: Pick<RouteDependencies, 'renderer' | 'translator' | 'templates'>
  ) {}

  mappingIndex = asyncHandler(async (req: Request, res: Response) => {
    const { itemTypeId } = mappingItemTypeParamSchema.parse(req.params);
    const page = await this.mappingService.getMappingPage(itemTypeId);

    switch (page.kind) {
      case 'empty': {
        const html = await this.deps.renderer.render(this.deps.templates.error, pageContext(req, this.deps.translator, {}));
        return res.send(html);
      }
      case 'redirect':
        return res.redirect(`${req.baseUrl}/${page.itemTypeId}`);
      case 'page': {
        const html = await this.deps.renderer.render(
          this.deps.templates.mapping,
          pageContext(req, this.deps.translator, { lists: page.lists, mapping: page.mapping, id: page.itemTypeId })
        );
        return res.send(html);
      }
    }
  });

  mappingRegister = asyncHandler(async (req: Request, res: Response) => {
    const saved = await this.mappingService.register(req.body);

    res.json({ msg: this.deps.translator.t(req.locale, saved ? 'Success' : 'Fail') });
  });
}
