import dotenv from 'dotenv';
import { LedgerSession } from '../../src/session.js';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

dotenv.config();

const config = loadConfig();
const session = new LedgerSession({ currency: config.defaultCurrency });
const app = createApp(session, { uploadLimit: config.uploadLimit });

app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
});
