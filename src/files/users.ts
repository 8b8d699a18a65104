/***
 *
 *
 *  User Database Files
 *
 *  Redox separates fields with semicolons:
 *
 *      /etc/passwd   name;uid;gid;realname;home;shell
 *      /etc/group    name;x;gid;member1,member2
 *      /etc/shadow   name;password
 *
 */

import type { Group, User } from "../types/modules"
import { sortedEntries, userHome } from "../config/plan"

export function passwdLine(name: string, user: User): string {
    return [
        name,
        String(user.uid),
        String(user.gid),
        user.realname ?? name,
        userHome(name, user),
        user.shell,
    ].join(";")
}

export function groupLine(name: string, group: Group): string {
    return `${name};x;${group.gid};${group.members.join(",")}`
}

export function shadowLine(name: string, user: User): string {
    return `${name};${user.password}`
}

export const PASSWD = function(users: Record<string, User>): string {
    return sortedEntries(users).map(([name, user]) => passwdLine(name, user)).join("\n") + "\n"
}

export const GROUP = function(groups: Record<string, Group>): string {
    return sortedEntries(groups).map(([name, group]) => groupLine(name, group)).join("\n") + "\n"
}

export const SHADOW = function(users: Record<string, User>): string {
    return sortedEntries(users).map(([name, user]) => shadowLine(name, user)).join("\n") + "\n"
}
