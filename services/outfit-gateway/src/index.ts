import express, { Request, Response } from 'express';
import cors from 'cors';
import { config as dotenvConfig } from 'dotenv';
import { createOutfitRecommendationsRouter } from './routes/outfit-recommendations';

// Load environment variables
dotenvConfig();

const app = express();
const PORT = parseInt(process.env.PORT || '8080', 10);

app.use(cors());
app.use(express.json({ limit: '2mb' }));

// =============================================================================
// Health Check Endpoints
// =============================================================================

app.get('/alive', (_req: Request, res: Response) => {
  res.json({
    status: 'ok',
    service: 'outfit-gateway',
    timestamp: new Date().toISOString()
  });
});

app.get('/health', (_req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    service: 'outfit-gateway',
    timestamp: new Date().toISOString()
  });
});

app.use('/api/v1/outfits', createOutfitRecommendationsRouter());

// Start server
if (process.env.NODE_ENV !== 'test') {
  app.listen(PORT, () => {
    console.log(`✅ Outfit gateway running on port ${PORT}`);
    console.log(`Outfit gateway: recommendation routes mounted at /api/v1/outfits`);
  });
}

export default app;
