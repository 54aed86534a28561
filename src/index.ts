import { config } from './config';
import { PlaceStore } from './services/PlaceStore';
import { PlaceGeocoder } from './services/PlaceGeocoder';
import { createServer } from './api/server';
import { logger } from './utils/logger';

logger.info({ dataPath: config.dataPath }, 'Starting saved places server...');

const store = new PlaceStore({ dataPath: config.dataPath });
const snapshot = store.reload();

if (snapshot.places.length === 0) {
  logger.warn({ dataPath: config.dataPath }, 'No places loaded, serving an empty collection');
}

const app = createServer(store);

const server = app.listen(config.port, () => {
  logger.info({ port: config.port }, `Server running on http://localhost:${config.port}`);
  logger.info('API endpoints:');
  logger.info('   GET  /health                 - Health check');
  logger.info('   GET  /api/lists              - Lists with pin counts');
  logger.info('   GET  /api/pins               - Pins (supports ?list&limit&offset)');
  logger.info('   GET  /api/pins/search        - Search (supports ?q&limit&offset)');
  logger.info('   GET  /api/pins/near          - Nearby (supports ?lat&lng&radiusKm&limit&offset)');
  logger.info('   GET  /api/pins/details       - Resolve a pin by name (?name)');
  logger.info('   GET  /api/pins/place/:id     - Pin by place id');
  logger.info('   GET  /api/categories         - Categories');
  logger.info('   GET  /api/stats              - Collection statistics');
  logger.info('   POST /api/reload             - Reload export files');
  logger.info('   GET  /api/stream             - SSE stream of snapshot updates');
});

// Geocode places without coordinates in the background; the server is already serving
if (config.geocodeMissing) {
  const geocoder = new PlaceGeocoder(config.geocoder);
  store.enrich(geocoder).catch((error: unknown) => {
    logger.error({ error }, 'Error while geocoding places');
  });
}

const shutdown = () => {
  logger.info('Shutting down gracefully...');
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
