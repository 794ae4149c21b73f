#!/usr/bin/env node
import { main } from '../rerun-cli.js';

main();
