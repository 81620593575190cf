import readline from "readline";
import { generateAccessToken } from "../utils/jwt";

/**
 * Sign an access token for an account. Operators hand these out; the API
 * itself has no login flow.
 */
export function issueToken(account: string): string {
  const id = account.trim();
  if (!id) {
    throw new Error("Account is required");
  }
  return generateAccessToken({ id });
}

const question = (query: string): Promise<string> => {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(query, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
};

// Run if called directly: npm run token -- <account>
if (require.main === module) {
  (async () => {
    const account = process.argv[2] ?? (await question("Account: "));
    console.log(issueToken(account));
  })().catch((error) => {
    console.error("❌ Could not issue token:", error);
    process.exit(1);
  });
}
