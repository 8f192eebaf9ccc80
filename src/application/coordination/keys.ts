// Coordination store key layout

export const coordinationKeys = {
  spawnCooldown: (chatId: string) => `cooldown:spawn:${chatId}`,
  claimCooldown: (userId: string) => `cooldown:claim:${userId}`,
  spawnLock: (spawnId: string) => `lock:spawn:${spawnId}`,
  battleLock: (battleId: string) => `lock:battle:${battleId}`,
} as const;
