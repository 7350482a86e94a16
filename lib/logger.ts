import pino from 'pino';

const logger = pino({
  name: 'blocklist-aggregator',
  level: process.env.LOG_LEVEL || 'info',
});

export default logger;
