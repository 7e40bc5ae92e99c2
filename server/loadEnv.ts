import dotenv from 'dotenv';

// values in .env win over the inherited environment
dotenv.config({ override: true });
