import express from 'express';
import cors from 'cors';
import { createTankRouter } from './routes/tank';
import { CatalogStore } from './services/catalog';
import { isDatabaseConfigured, testConnection } from './services/database';
import { settings } from './services/settings';
import { ENGINE_VERSION, TABLE_VERSION } from './constants';

export const catalogStore = new CatalogStore();

const app = express();

app.use(cors());
app.use(express.json({ limit: '1mb' }));

// Health check
app.get('/health', (req, res) => {
  const catalog = catalogStore.current();
  res.json({
    status: 'ok',
    version: ENGINE_VERSION,
    table_version: TABLE_VERSION,
    catalog: {
      source: catalog.source,
      parts: catalog.size
    },
    database: isDatabaseConfigured() ? 'configured' : 'not configured',
    endpoints: {
      calculate: '/api/v1/tank/calculate',
      options: '/api/v1/tank/options'
    }
  });
});

app.use('/api/v1/tank', createTankRouter(catalogStore));

async function startServer() {
  const dbConfigured = isDatabaseConfigured();
  let dbConnected = false;

  if (dbConfigured) {
    dbConnected = await testConnection();
  }

  try {
    await catalogStore.reload();
  } catch (error) {
    console.error('❌ Catalog load failed - prices and weights will be zero:', error instanceof Error ? error.message : error);
  }

  const port = settings.port;
  app.listen(port, () => {
    console.log(`🚀 GRP Tank BOM API v${ENGINE_VERSION} running on port ${port}`);
    console.log('');
    console.log('📊 Database Status:');
    if (!dbConfigured) {
      console.log('   ⚠️  Not configured - using catalog file');
    } else if (dbConnected) {
      console.log('   ✅ Connected to Supabase');
    } else {
      console.log('   ❌ Configured but connection failed');
    }
    console.log('');
    console.log('📌 API Endpoints:');
    console.log(`   Health:       http://localhost:${port}/health`);
    console.log(`   Calculate:    POST http://localhost:${port}/api/v1/tank/calculate`);
    console.log(`   Capacity:     POST http://localhost:${port}/api/v1/tank/capacity`);
    console.log(`   Options:      GET  http://localhost:${port}/api/v1/tank/options`);
    console.log(`   Fittings:     GET  http://localhost:${port}/api/v1/tank/fittings`);
    console.log(`   Prices:       GET  http://localhost:${port}/api/v1/tank/prices`);
  });
}

if (require.main === module) {
  startServer().catch(error => {
    console.error('❌ Server failed to start:', error);
    process.exit(1);
  });
}

export default app;
