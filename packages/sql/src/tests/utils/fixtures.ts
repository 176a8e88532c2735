import { belongsTo, defineSchema, hasMany, hasOne } from "../../core/schema/define-schema"
import type { SqlRow } from "../../ports/sql-value"

export const schema = defineSchema({
  User: {
    table: "users",
    associations: { posts: hasMany("Post"), profile: hasOne("Profile") },
  },
  Post: { table: "posts", associations: { user: belongsTo("User") } },
  Profile: { table: "profiles", associations: { user: belongsTo("User") } },
  Broken: { table: "broken" },
})

export const user1 = { id: 1, username: "Ben Wilson" }
export const user2 = { id: 2, username: "Andy McVitty" }

export const post10 = { id: 10, user_id: 1, title: "Hello" }
export const post11 = { id: 11, user_id: 1, title: "Again" }
export const post12 = { id: 12, user_id: 2, title: "Hi" }
export const orphan = { id: 13, user_id: null, title: "Orphan" }

export const profile1 = { id: 100, user_id: 1, bio: "Writes tests" }

export function tables(): Record<string, SqlRow[]> {
  return {
    users: [user1, user2],
    posts: [post10, post11, post12, orphan],
    profiles: [profile1],
  }
}
