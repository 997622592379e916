import { Router } from 'express';
import { awardPoints, getUserSummary, listBadges, listLeaderboard, listUsers } from '../services/demoService';
import { awardActionSchema } from '../utils/validation';

const router = Router();

router.get('/leaderboard', (_req, res) => {
  res.json(listLeaderboard());
});

router.get('/badges', (_req, res) => {
  res.json(listBadges());
});

router.get('/users', (_req, res) => {
  res.json(listUsers());
});

router.get('/user/:userId', (req, res) => {
  res.json(getUserSummary(req.params.userId));
});

// Write-shaped endpoints only acknowledge; the demo data never changes.
router.post('/award', (req, res) => {
  const parsed = awardActionSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ message: 'Invalid payload', issues: parsed.error.flatten() });
  }
  res.json(awardPoints(parsed.data));
});

export default router;
