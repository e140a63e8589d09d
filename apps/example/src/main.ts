#!/usr/bin/env node
import { runServiceAndExit } from '@keeper/supervisor';
import { HeartbeatService } from './heartbeat.js';

await runServiceAndExit(new HeartbeatService());
