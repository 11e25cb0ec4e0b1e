import {
  CacheStrategy,
  CatalogClient,
  type CatalogTransport,
  Gateway,
  SearchOrchestrator
} from '../src';

const products = [
  { id: 1, name: 'Summer Linen Outfit', final_price: 480, rating: 4.6, tags: 'summer, outfit', is_best_seller: true },
  { id: 2, name: 'Beach Summer Dress', final_price: 320, rating: 4.1, colors: [{ name: 'Yellow' }] },
  { id: 3, name: 'Winter Wool Coat', final_price: 1450, rating: 4.8 },
  { id: 4, name: 'Casual Outfit Set', final_price: 260, rating: 3.9, stock_quantity: 0 },
  { id: 5, name: 'Black T-Shirt', final_price: 180, rating: 4.3, colors: ['Black'] }
];

/**
 * In-process stand-in for the catalog service: every search returns the whole
 * catalog and lets the ranker sort it out.
 */
const inMemoryTransport: CatalogTransport = (request) => {
  if (request.endpoint.startsWith('/product-details/')) {
    const id = request.endpoint.split('/').pop();
    const record = products.find(entry => String(entry.id) === id);
    return Promise.resolve({ status: 200, data: { data: record ?? null } });
  }
  return Promise.resolve({ status: 200, data: { products } });
};

/**
 * Demonstrates query normalization, fuzzy ranking and response caching
 * on top of a single Gateway
 */
export async function catalogSearchExample(): Promise<void> {
  console.log('Catalog Search Example');
  console.log('======================\n');

  const gateway = new Gateway(inMemoryTransport, {
    rateLimit: { budget: 30 },
    cache: { ttls: { [CacheStrategy.SHORT_TERM]: 10 * 1000 } }
  });

  const subscription = gateway.subscribe(
    event => console.log(`  event: ${event.type}`),
    { eventTypes: ['cache_hit', 'cache_stored'] }
  );

  const search = new SearchOrchestrator(gateway);

  for (const query of ['summer outfit', 'I want a sumer outfitt please', 'عايز تيشرت اسود']) {
    const result = await search.search(query, 3);
    console.log(`Query: "${query}"`);
    console.log(`  canonical: "${result.query.canonicalText}"`);
    console.log(`  cached: ${result.response?.cached ?? false}`);
    result.matches.forEach(match => {
      console.log(`  #${match.rank} ${match.item.name} (similarity ${match.similarityScore.toFixed(2)})`);
    });
    if (result.suggestions.length > 0) {
      console.log(`  try: ${result.suggestions.join(', ')}`);
    }
    console.log('');
  }

  const catalog = new CatalogClient(gateway);
  const details = await catalog.getProductDetails(5);
  console.log(`Details for 5: ${details.item?.name ?? 'not found'}`);

  const affordable = await catalog.getProductsByPriceRange(150, 350);
  console.log(`Between 150 and 350: ${affordable.items.map(item => item.name).join(', ')}`);

  const status = gateway.getStatus();
  console.log('\nGateway status:');
  console.log(`  cache: ${status.cacheSize}/${status.cacheMaxSize} entries, ${status.cacheHitCount} hits`);
  console.log(`  rate limit: ${status.rateLimitUsed}/${status.rateLimitBudget} used`);
  console.log(`  breaker: ${status.breakerState}`);

  subscription.unsubscribe();
}
