import { parseAbi } from 'viem';

/**
 * Contract interfaces the gateway reads from and writes to.
 */

export const ACCESS_POLICY_ABI = parseAbi([
  'function checkAccess(address user) view returns (bool access, bool free)',
]);

export const ERC1155_ABI = parseAbi([
  'function balanceOf(address account, uint256 id) view returns (uint256)',
  'function balanceOfBatch(address[] accounts, uint256[] ids) view returns (uint256[])',
  'event TransferSingle(address indexed operator, address indexed from, address indexed to, uint256 id, uint256 value)',
  'event TransferBatch(address indexed operator, address indexed from, address indexed to, uint256[] ids, uint256[] values)',
]);

export const DELEGATE_REGISTRY_ABI = parseAbi([
  'function getIncomingDelegations(address to) view returns ((uint8 type_, address to, address from, bytes32 rights, address contract_, uint256 tokenId, uint256 amount)[] delegations_)',
]);

export const COLLECTION_DELEGATION_ABI = parseAbi([
  'function retrieveDelegationAddresses(address delegationAddress, address collectionAddress, uint256 useCase) view returns (address[])',
]);

export const SESSION_MANAGER_ABI = parseAbi([
  'function openFreeSession(address user, address node, uint256 duration) returns (uint256)',
  'function closeSession(uint256 sessionId)',
  'function getActiveSessionId(address user) view returns (uint256)',
  'function getSession(uint256 sessionId) view returns ((address user, address node, uint256 payment, uint256 startedAt, uint256 duration, bool active, bool settled))',
  'function pricePerHour() view returns (uint256)',
  'function maxSessionDuration() view returns (uint256)',
  'function calculatePrice(uint256 duration) view returns (uint256)',
]);

export const SUBSCRIPTION_MANAGER_ABI = parseAbi([
  'function hasActiveSubscription(address user) view returns (bool)',
  'function getSubscription(address user) view returns ((address user, address node, uint256 payment, uint256 startedAt, uint256 expiresAt, uint8 tier))',
  'function remainingTime(address user) view returns (uint256)',
  'function getActiveTierIds() view returns (uint8[])',
  'function tiers(uint8 id) view returns (uint256 price, uint256 duration, bool active)',
]);

export const NODE_REGISTRY_ABI = parseAbi([
  'struct Node { address operator; string endpoint; string wgPubKey; string region; uint256 stakedAmount; uint256 registeredAt; uint256 lastHeartbeat; bool active; bool slashed; }',
  'function getActiveNodes() view returns (Node[])',
  'function getActiveNodesByRegion(string region) view returns (Node[])',
]);
