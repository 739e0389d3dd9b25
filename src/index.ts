import { HttpServer } from './api/http-server';
import { CONFIG } from './config';
import { DocumentFetcher } from './services/document-fetcher.service';
import { HouseListingService } from './services/house-listing.service';
import { ListingCacheService } from './services/listing-cache.service';

async function main() {
  console.log('Starting Town House Listings API...');
  console.log(`Environment: ${CONFIG.nodeEnv}`);
  console.log(`Upstream: ${CONFIG.tibia.communityUrl}`);

  const cache = CONFIG.mongodb.uri ? new ListingCacheService() : null;
  const listings = new HouseListingService(new DocumentFetcher(), { cache });
  const server = new HttpServer(listings);

  try {
    if (cache) {
      await cache.connect();
    } else {
      console.log('MONGODB_URI not set, listing cache disabled');
    }

    await server.start();

    console.log('Town House Listings API is running');
  } catch (error) {
    console.error('Fatal error:', error);
    await cleanup(server, cache);
    process.exit(1);
  }

  // Graceful shutdown
  process.on('SIGTERM', async () => {
    console.log('SIGTERM received, shutting down...');
    await cleanup(server, cache);
    process.exit(0);
  });

  process.on('SIGINT', async () => {
    console.log('SIGINT received, shutting down...');
    await cleanup(server, cache);
    process.exit(0);
  });
}

async function cleanup(server: HttpServer, cache: ListingCacheService | null): Promise<void> {
  try {
    await server.stop();
    await cache?.close();
    console.log('Cleanup completed');
  } catch (error) {
    console.error('Error during cleanup:', error);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
