#!/usr/bin/env node

import { defineCommand, runMain } from "citty"

import { listen } from "./listen"
import { watch } from "./watch"

const main = defineCommand({
  meta: {
    name: "display-handoff",
    description:
      "Put one machine's display to sleep when another machine's display turns on",
  },
  subCommands: { watch, listen },
})

void runMain(main)
