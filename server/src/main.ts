#!/usr/bin/env node
import { startServer } from './index';

// Lexical features, built-in properties and import loading only; embedders
// with a grammar parser call startServer(parser) themselves.
startServer();
