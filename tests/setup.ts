// Keep SDK clients on their default endpoints regardless of the host shell.
delete process.env.ANTHROPIC_BASE_URL;
delete process.env.OPENAI_BASE_URL;
