import db from '../db-knex'
import { friendshipService } from '../services/friendshipService'
import { userService } from '../services/userService'

async function makeFriends(username1: string, username2: string) {
  const user1 = await userService.getUserByUsername(username1)
  const user2 = await userService.getUserByUsername(username2)

  if (!user1) {
    console.error(`❌ User not found: ${username1}`)
    process.exitCode = 1
    return
  }
  if (!user2) {
    console.error(`❌ User not found: ${username2}`)
    process.exitCode = 1
    return
  }

  if (await friendshipService.areFriends(user1.id, user2.id)) {
    console.log(`✅ ${username1} and ${username2} are already friends`)
    return
  }

  await friendshipService.createFriendship(user1.id, user2.id)
  console.log(`✅ ${username1} and ${username2} are now friends!`)
}

const [username1, username2] = process.argv.slice(2)
if (!username1 || !username2) {
  console.error('Usage: make-friends.ts <username1> <username2>')
  process.exit(1)
}

makeFriends(username1, username2)
  .catch((error) => {
    console.error('❌ Error creating friendship:', error)
    process.exitCode = 1
  })
  .finally(() => db.destroy())
