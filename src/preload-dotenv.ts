/**
 * Must be imported first, so .env values are in place before config / logger read process.env
 */
import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

dotenv.config({ path: path.join(os.homedir(), '.config', 'voice-dictation', '.env') });
dotenv.config({ path: path.resolve(process.cwd(), '.env'), override: true });
