import "dotenv/config";
import { run } from "./bootstrap";

void run();
