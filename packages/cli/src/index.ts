#!/usr/bin/env tsx

import { createProgram } from "./program.ts";

await createProgram().parseAsync();
