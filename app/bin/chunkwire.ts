#!/usr/bin/env node

import { program } from '../cli.js';

program.parse(process.argv);
