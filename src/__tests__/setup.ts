import { initLogger } from '../utils/logger.js';

// Keep test output free of pipeline logs
initLogger({ level: 'silent', jsonLogs: true });
