import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/error-handler.js';
import type { MemberRelationService } from '../services/member-relation.service.js';
import { RelationListQuerySchema, RelationPairSchema } from '../validation/schemas.js';

export function createRelationRouter(memberRelationService: MemberRelationService): Router {
  const router = Router();

  /**
   * GET /api/relations/:memberId?type=all|friend|accompany
   * Ids of the members `memberId` relates to
   */
  router.get(
    '/:memberId',
    asyncHandler(async (req: Request, res: Response) => {
      const { type } = RelationListQuerySchema.parse(req.query);
      const { memberId } = req.params;

      let memberIds: string[];
      switch (type) {
        case 'friend':
          memberIds = await memberRelationService.getFriendRelationIds(memberId);
          break;
        case 'accompany':
          memberIds = await memberRelationService.getAccompanyRelationIds(memberId);
          break;
        default:
          memberIds = await memberRelationService.getAllRelationShip(memberId);
      }

      res.json({ memberId, type, memberIds });
    })
  );

  /**
   * POST /api/relations
   * Body: { fromId, toId } - creates an ACCOMPANY relation
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { fromId, toId } = RelationPairSchema.parse(req.body);
      const relation = await memberRelationService.createRelation(fromId, toId);
      res.status(201).json(relation);
    })
  );

  /**
   * PATCH /api/relations/friend
   * Body: { fromId, toId } - promotes the relation to FRIEND
   */
  router.patch(
    '/friend',
    asyncHandler(async (req: Request, res: Response) => {
      const { fromId, toId } = RelationPairSchema.parse(req.body);
      const relation = await memberRelationService.updateRelationToFriend(fromId, toId);
      res.json(relation);
    })
  );

  return router;
}
