import dotenv from 'dotenv';

import { createApp } from './app';
import { loadConfig } from './config';
import { createAppContext } from './context';

dotenv.config();

const config = loadConfig();

async function start() {
    const ctx = await createAppContext(config);
    const app = createApp(ctx);

    app.listen(config.port, () => console.log(`Server running on port ${config.port}`));
}

start().catch(error => {
    console.error('[Server] Startup failed', error);
    process.exit(1);
});
