import { run } from '@/main';

process.exitCode = run();
