/*
  Load .env.local (then .env) so cfg() works in scripts.
  Import this before anything that reads configuration.
*/
import path from 'path';
import dotenv from 'dotenv';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config({ path: path.resolve(process.cwd(), '.env') });
