/**
 * Main Entry
 * Layer: action
 *
 * GitHub Action entry point. Also runnable locally with a .env file.
 */

import 'dotenv/config';
import { run } from './controller';

void run();
