// Runs before every test file: keep the oracle and database out of reach.
delete process.env.DATABASE_URL;
delete process.env.GEMINI_API_KEY;
delete process.env.OPENAI_API_KEY;
delete process.env.PERPLEXITY_API_KEY;
