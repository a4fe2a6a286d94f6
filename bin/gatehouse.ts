#!/usr/bin/env node
import { main } from '../src/cli/index.js';

void main();
