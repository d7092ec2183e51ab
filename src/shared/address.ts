import { ZeroAddress, getAddress, isAddress } from "ethers";

export type AddressCheck = { ok: true; address: string } | { ok: false; reason: string };

/**
 * Accepts 0x-prefixed 20-byte hex. Mixed-case input must carry a valid
 * EIP-55 checksum; all-lower and all-upper input is taken as un-checksummed.
 */
export function checkDestinationAddress(input: string): AddressCheck {
  const trimmed = input.trim();
  if (!/^0x[0-9a-fA-F]{40}$/.test(trimmed)) {
    return { ok: false, reason: `not a 0x-prefixed 20-byte hex address: ${trimmed}` };
  }
  if (!isAddress(trimmed)) {
    return { ok: false, reason: `address checksum mismatch: ${trimmed}` };
  }

  const address = getAddress(trimmed);
  if (address === ZeroAddress) {
    return { ok: false, reason: "zero address is not a valid destination" };
  }
  return { ok: true, address };
}
