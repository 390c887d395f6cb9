// src/ingestion/ingest.cli.ts
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { IngestionService } from './ingestion.service';

function getArg(name: string): string | undefined {
  const key = `--${name}=`;
  const hit = process.argv.find((a) => a.startsWith(key));
  return hit ? hit.slice(key.length) : undefined;
}

async function main() {
  const dir = getArg('dir') ?? process.env.LAW_FILES_DIR;
  if (!dir) {
    console.error('Usage: ingest --dir=<directory of law JSON files> [--startId=1]');
    process.exit(2);
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });

  try {
    const ingestion = app.get(IngestionService);
    const startId = getArg('startId') ? Number(getArg('startId')) : undefined;

    const report = await ingestion.ingestDirectory(dir, { startId });
    console.log(JSON.stringify(report));

    await app.close();
    process.exit(0);
  } catch (e) {
    console.error(e);
    await app.close();
    process.exit(1);
  }
}

void main();
