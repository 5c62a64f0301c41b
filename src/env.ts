import dotenv from "dotenv";

// Imported first by the entry points: the logger reads its level from the environment on load.
dotenv.config({ quiet: true });
