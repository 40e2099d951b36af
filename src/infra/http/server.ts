import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from '../config.js';

dotenv.config();

const config = loadConfig();
const app = createApp(config);

// Start server
app.listen(config.PORT, () => {
  console.log(`Ledger replay service running on http://localhost:${config.PORT}`);
  console.log(`Health check: http://localhost:${config.PORT}/healthz`);
});

export default app;
