import dotenv from 'dotenv';

// Values already present in the process environment win over .env.
dotenv.config();
