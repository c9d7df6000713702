import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

// Keep solver logs out of the test output unless asked for
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}
