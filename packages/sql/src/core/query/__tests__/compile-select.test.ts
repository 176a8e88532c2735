import { compileSelect, quoteIdentifier } from "../compile-select"
import { SelectQuery } from "../select-query"

describe("compileSelect", () => {
  it("selects a whole table", () => {
    expect(compileSelect(SelectQuery.from("users"))).toEqual({
      text: 'select * from "users"',
      values: [],
    })
  })

  it("binds conditions in order and appends the ordering", () => {
    const query = SelectQuery.from("app.posts")
      .where("status", "published")
      .whereIn("user_id", [1, 2])
      .whereNull("deleted_at")
      .orderBy("id", "desc")
      .orderBy("title")

    expect(compileSelect(query)).toEqual({
      text:
        'select * from "app"."posts" where "status" = $1 and "user_id" = any($2)' +
        ' and "deleted_at" is null order by "id" desc, "title" asc',
      values: ["published", [1, 2]],
    })
  })

  it("compiles a null comparison to is null", () => {
    expect(compileSelect(SelectQuery.from("posts").where("user_id", null)).text).toBe(
      'select * from "posts" where "user_id" is null',
    )
  })

  it("leaves the original query untouched", () => {
    const base = SelectQuery.from("posts")
    base.where("id", 1).orderBy("id")

    expect(base.conditions).toEqual([])
    expect(base.order).toEqual([])
  })
})

describe("quoteIdentifier", () => {
  it("doubles embedded quotes", () => {
    expect(quoteIdentifier('we"ird')).toBe('"we""ird"')
  })
})
