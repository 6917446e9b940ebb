import { CacheLayer, Manager, consoleLogger, setLogger } from '../../src';

type Repo = {
  name: string;
  stars: number;
  language: string | null;
  archived: boolean;
};

// Stand-in for a slow remote API that fails every third call
// ==============================

let calls = 0;

async function listRepos(): Promise<Repo[]> {
  calls++;
  await new Promise((resolve) => setTimeout(resolve, 50));
  if (calls % 3 === 0) {
    throw new Error('503 Service Unavailable');
  }
  return [
    { name: 'api', stars: 120, language: 'TypeScript', archived: false },
    { name: 'web', stars: 48, language: 'TypeScript', archived: false },
    { name: 'legacy', stars: 300, language: null, archived: true },
  ];
}

async function main() {
  setLogger(consoleLogger);

  let now = Date.now();
  const cache = new CacheLayer<readonly Repo[]>({ now: () => now });
  const repos = Manager.fromFetch(listRepos, { name: 'Repo', cache });

  // First query fetches; the second is served from the cache
  const popular = await repos.filter({ stars__gte: 100 }).exclude({ archived: true }).execute();
  console.log('Popular:', popular.items.map((repo) => repo.name), popular.snapshot);

  const languages = await repos.valuesFlat('language').distinct().execute();
  console.log('Languages:', languages.items, languages.snapshot.status);

  // Let the five-minute TTL pass; the next fetch succeeds
  now += 5 * 60 * 1000;
  console.log('After expiry:', (await repos.execute()).snapshot.status);

  // Expire again; this fetch fails and the previous records are served
  now += 5 * 60 * 1000;
  const degraded = await repos.execute();
  console.log('Degraded:', degraded.snapshot.degraded, degraded.snapshot.status);

  // An explicit refresh does not fall back
  try {
    await repos.refresh();
    console.log('Refreshed');
  }
  catch (error) {
    console.error('Refresh failed:', error);
  }

  console.log('Cache stats:', cache.stats());
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
