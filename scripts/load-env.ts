// Load environment variables from .env.local or .env in the working directory
import dotenv from 'dotenv';
import path from 'path';

// .env.local wins: dotenv never overrides a variable that is already set
dotenv.config({ path: path.join(process.cwd(), '.env.local') });
dotenv.config({ path: path.join(process.cwd(), '.env') });
