import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/error-handler.js';
import type { MemberService } from '../services/member.service.js';
import { RegisterMemberSchema } from '../validation/schemas.js';

export function createMemberRouter(memberService: MemberService): Router {
  const router = Router();

  /**
   * POST /api/members
   * Register a member; default ACCOMPANY relations are created with everyone
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { fullName } = RegisterMemberSchema.parse(req.body);
      const member = await memberService.registerMember(fullName);
      res.status(201).json(member);
    })
  );

  /**
   * GET /api/members/:id
   */
  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await memberService.getMember(req.params.id));
    })
  );

  return router;
}
