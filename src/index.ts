/**
 * The entrypoint for the action.
 */
import { run } from '@/main';

await run();
