/**
 * Example usage of the X1 memo SDK
 *
 * Covers reading profiles and statistics, creating a profile, burning with
 * a message, and telling failures apart by error class.
 */

import { Keypair } from '@solana/web3.js';
import {
  InvalidParameterError,
  KeypairSigner,
  MemoClient,
  TOKEN_UNIT,
  TimeoutError,
  TransactionFailedError,
  loadSettingsFromEnv,
} from '../src/index.js';

async function readExample() {
  // X1_NETWORK, X1_RPC_URL and friends, from the environment or .env
  const client = new MemoClient({ settings: loadSettingsFromEnv() });
  console.log(`Connected to ${client.endpoint} (${client.networkType})`);

  const owner = Keypair.generate().publicKey;
  const display = await client.profile.getDisplayInfo(owner);
  console.log('Display name:', display.label, display.hasProfile ? '' : '(no profile)');

  const blogs = await client.blog.getAllStatistics();
  console.log(`Blogs: ${blogs.valid}/${blogs.total} readable, ${blogs.totalBurned / TOKEN_UNIT} tokens burned`);

  const top = await client.burn.getTopBurners(5);
  top.forEach((burner, index) => {
    console.log(`  #${index + 1} ${burner.user.toBase58()} ${burner.totalBurned / TOKEN_UNIT}`);
  });

  console.log('Next mint reward:', await client.mint.getCurrentMintRewardFormatted());
}

async function createProfileExample() {
  const client = new MemoClient({ settings: loadSettingsFromEnv() });
  const payer = Keypair.generate(); // load a funded keypair in real use
  const signer = new KeypairSigner(payer);

  const operation = client.profile.buildCreateProfile(
    payer.publicKey,
    { username: 'example-user', image: '', aboutMe: 'Posting memos on X1' },
    420n * TOKEN_UNIT
  );

  // prepare() simulates and sizes the compute budget without sending
  const prepared = await client.prepare(operation);
  console.log('Compute unit limit:', prepared.unitLimit);

  const result = await client.sendPrepared(prepared, signer);
  console.log('Profile created:', result.signature);
}

async function burnExample() {
  const client = new MemoClient({ settings: loadSettingsFromEnv() });
  const payer = Keypair.generate();

  try {
    const result = await client.submit(
      client.burn.buildBurn(payer.publicKey, 10n * TOKEN_UNIT, 'Burning ten tokens to say hello to everyone on X1'),
      new KeypairSigner(payer)
    );
    console.log('Burned:', result.signature);
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      console.error(`Bad input (${error.field}):`, error.message);
    } else if (error instanceof TransactionFailedError) {
      console.error('Rejected on chain:', error.message);
    } else if (error instanceof TimeoutError) {
      console.error('RPC timed out, safe to retry');
    } else {
      throw error;
    }
  }
}

// Run examples
if (require.main === module) {
  console.log('X1 memo SDK examples\n');

  readExample()
    .then(() => console.log('\n✓ Read example complete'))
    .catch(console.error);

  // These send transactions and need a funded keypair:
  // createProfileExample().catch(console.error);
  // burnExample().catch(console.error);
}

export { readExample, createProfileExample, burnExample };
