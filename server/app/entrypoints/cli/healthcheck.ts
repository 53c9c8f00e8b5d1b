import { probe } from "../../infrastructure/health-probe";
import { Env } from "../api/env";

const url = process.argv[2] ?? `http://${Env.HOST}:${Env.PORT}/health`;

probe(url)
  .then((healthy) => process.exit(healthy ? 0 : 1))
  .catch(() => process.exit(1));
