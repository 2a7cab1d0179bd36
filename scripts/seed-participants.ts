import { env } from '../src/env';
import { loadContactsFile } from '../src/campaign/participants';
import { RedisParticipantStore } from '../src/campaign/participantStore';
import { createRedisClient } from '../src/redis/client';

// usage: npm run survey:seed -- [contacts.json]
async function main(): Promise<void> {
  const contactsFile = process.argv[2] ?? env.CAMPAIGN_CONTACTS_FILE;
  if (!contactsFile) {
    throw new Error('no contacts file: pass a path or set CAMPAIGN_CONTACTS_FILE');
  }

  const contacts = await loadContactsFile(contactsFile);
  const redis = createRedisClient(env.REDIS_URL);
  const store = new RedisParticipantStore({ prefix: env.SESSION_PREFIX, redis });

  try {
    for (const contact of contacts) {
      const participant = await store.upsertContact(contact);
      process.stdout.write(`${participant.participantId} ${participant.status} attempts=${participant.attempts}\n`);
    }
    process.stdout.write(`seeded ${contacts.length} participants into ${env.SESSION_PREFIX}:participants\n`);
  } finally {
    await redis.quit();
  }
}

main().catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
